/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * Adds requestStartTime, set by the requestTimer middleware and read by the
 * catalog controller to compute meta.totalTimeMs.
 */
declare global {
  namespace Express {
    interface Request {
      /** Set by requestTimer middleware; used to compute totalTimeMs in responses. */
      requestStartTime?: number;
    }
  }
}

export {};
