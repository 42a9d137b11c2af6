#!/usr/bin/env tsx
/**
 * CLI: Page Capture
 *
 * Usage:
 *   pagesnap <url> [options]
 *
 * Example:
 *   pagesnap https://example.com --output ./screenshots/example.png --json
 */

import { mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import { createPageCapturer } from '../lib/capture/index.js';
import { createConfigParser, loadConfig } from '../lib/config/index.js';
import { formatSnapshotSummary, writeSnapshotJson } from '../lib/report/index.js';
import type { CaptureRequestInput } from '../lib/snapshot/index.js';
import { parseCaptureArgs, USAGE } from './args.js';

async function main() {
  const parsed = parseCaptureArgs(process.argv.slice(2));

  if (parsed.kind === 'help') {
    console.log(USAGE);
    process.exit(0);
  }
  if (parsed.kind === 'error') {
    console.error(`❌ ${parsed.message}`);
    process.exit(1);
  }

  const args = parsed.args;

  try {
    const config = await loadConfig(args.config);
    const parser = createConfigParser();
    const defaults = parser.toRequestDefaults(config);

    const outputPath =
      args.output ?? join(config.output_dir, `capture_${Math.floor(Date.now() / 1000)}.png`);
    await mkdir(dirname(outputPath), { recursive: true });

    const request: CaptureRequestInput = {
      ...defaults,
      url: args.url,
      outputPath,
      fullPage: args.fullPage ?? defaults.fullPage,
      viewport: {
        width: args.width ?? config.viewport.width,
        height: args.height ?? config.viewport.height,
      },
      waitMs: args.waitMs ?? defaults.waitMs,
      scrollDelayMs: args.scrollDelayMs ?? defaults.scrollDelayMs,
      timeoutMs: args.timeoutMs ?? defaults.timeoutMs,
    };

    const capturer = createPageCapturer({
      ...parser.toCapturerOptions(config),
      browser: args.browser ?? config.browser,
      headless: args.headed ? false : config.headless,
    });

    console.log('📸 pagesnap - Page Capture\n');
    console.log(`URL: ${request.url}`);
    console.log(`Output: ${outputPath}`);
    console.log(`Full page: ${request.fullPage}`);
    console.log('');

    const startTime = Date.now();

    if (args.imageOnly) {
      const ok = await capturer.captureImage(request);
      if (!ok) process.exit(1);
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      console.log(`\n✅ Screenshot saved to ${outputPath} in ${elapsed}s`);
      return;
    }

    const outcome = await capturer.captureFull(request);
    if (!outcome.ok) {
      console.error(`❌ Capture failed (${outcome.failure.kind}): ${outcome.failure.message}`);
      process.exit(1);
    }

    const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
    console.log(`\n✅ Screenshot and content captured in ${elapsed}s\n`);

    for (const line of formatSnapshotSummary(outcome.value)) {
      console.log(line);
    }

    if (args.json) {
      const jsonPath = outputPath.replace(/\.png$/i, '') + '.json';
      await writeSnapshotJson(outcome.value, jsonPath);
      console.log(`📄 Content saved to ${jsonPath}`);
    }
  } catch (error) {
    console.error('❌ Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  }
}

main().catch(error => {
  console.error('❌ Error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
