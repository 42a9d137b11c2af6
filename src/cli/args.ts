/**
 * Argument parsing for the capture CLI
 */

import { BROWSER_NAMES } from '../lib/browser/index.js';
import type { BrowserName } from '../lib/browser/index.js';

export interface CaptureArgs {
  url: string;
  output?: string;
  config?: string;
  fullPage?: boolean;
  width?: number;
  height?: number;
  waitMs?: number;
  scrollDelayMs?: number;
  timeoutMs?: number;
  browser?: BrowserName;
  headed: boolean;
  imageOnly: boolean;
  json: boolean;
}

export type ParsedArgs =
  | { kind: 'help' }
  | { kind: 'error'; message: string }
  | { kind: 'capture'; args: CaptureArgs };

export const USAGE = `
pagesnap - Page Capture

Usage:
  npx tsx src/cli/capture.ts <url> [options]

Arguments:
  url              The URL to capture

Options:
  --output         PNG path (default: <output_dir>/capture_<timestamp>.png)
  --config         Config file (default: .pagesnap.yml if present)
  --no-full-page   Capture only the viewport
  --width          Viewport width (default: 1920)
  --height         Viewport height (default: 1080)
  --wait           Wait in ms after page load (default: 3000)
  --scroll-delay   Delay in ms per lazy-load scroll step (default: 500)
  --timeout        Navigation timeout in ms (default: 30000)
  --browser        chromium, firefox or webkit (default: chromium)
  --headed         Show the browser window
  --image-only     Skip content extraction
  --json           Save the extracted content next to the screenshot

Examples:
  npx tsx src/cli/capture.ts https://example.com
  npx tsx src/cli/capture.ts https://example.com --output ./shots/home.png --json
  npx tsx src/cli/capture.ts https://example.com --no-full-page --width 390 --height 844
`;

function readOption(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index >= 0 ? args[index + 1] : undefined;
}

function readNumber(args: string[], flag: string): number | undefined {
  const value = readOption(args, flag);
  return value === undefined ? undefined : Number(value);
}

function isBrowserName(value: string): value is BrowserName {
  return BROWSER_NAMES.some(name => name === value);
}

export function parseCaptureArgs(args: string[]): ParsedArgs {
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    return { kind: 'help' };
  }

  const url = args[0];
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    return { kind: 'error', message: 'URL must start with http:// or https://' };
  }

  const browser = readOption(args, '--browser');
  if (browser !== undefined && !isBrowserName(browser)) {
    return {
      kind: 'error',
      message: `Unknown browser "${browser}" (expected ${BROWSER_NAMES.join(', ')})`,
    };
  }

  return {
    kind: 'capture',
    args: {
      url,
      output: readOption(args, '--output'),
      config: readOption(args, '--config'),
      fullPage: args.includes('--no-full-page') ? false : undefined,
      width: readNumber(args, '--width'),
      height: readNumber(args, '--height'),
      waitMs: readNumber(args, '--wait'),
      scrollDelayMs: readNumber(args, '--scroll-delay'),
      timeoutMs: readNumber(args, '--timeout'),
      browser,
      headed: args.includes('--headed'),
      imageOnly: args.includes('--image-only'),
      json: args.includes('--json'),
    },
  };
}
