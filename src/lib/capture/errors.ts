/**
 * Capture outcomes and failure classification.
 */

import { ZodError } from 'zod';
import { isNavigationTimeout } from '../browser/index.js';

export type CaptureFailureKind = 'navigation-timeout' | 'invalid-request' | 'unclassified';

export interface CaptureFailure {
  kind: CaptureFailureKind;
  message: string;
}

export type CaptureOutcome<T> = { ok: true; value: T } | { ok: false; failure: CaptureFailure };

export function classifyFailure(error: unknown): CaptureFailure {
  if (error instanceof ZodError) {
    return {
      kind: 'invalid-request',
      message: error.issues
        .map(issue => `${issue.path.join('.') || 'request'}: ${issue.message}`)
        .join('; '),
    };
  }

  if (isNavigationTimeout(error)) {
    return { kind: 'navigation-timeout', message: error.message };
  }

  return {
    kind: 'unclassified',
    message: error instanceof Error ? error.message : String(error),
  };
}
