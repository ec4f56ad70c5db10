/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * A module rather than a .d.ts so the augmentation is pulled in by import
 * wherever it is used, under tsc and ts-jest alike.
 *
 * requestStartTime is set by the requestTimer middleware and read by
 * PostController to compute `meta.totalTimeMs`.
 */
declare global {
  namespace Express {
    interface Request {
      requestStartTime?: number;
    }
  }
}

export {};
