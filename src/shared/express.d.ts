/**
 * Express Request Augmentation
 * Layer: Shared (type declarations)
 *
 * requestStartTime is set by the requestTimer middleware and read by the
 * analysis controller to compute totalTimeMs.
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
