/**
 * Limits shared by both forwarding directions of a session.
 */
export interface BackpressurePolicy {
  /** Buffered-but-unframed bytes above which the buffer is discarded. */
  maxBufferedBytes: number;
  /** Extraction steps per push; the remainder waits for the next drain. */
  maxMessagesPerPush: number;
  /** Largest accepted framed body, also the largest bare object. */
  maxFrameBodyBytes: number;
  /** Back-to-back invalid frames tolerated before the buffer is dropped. */
  maxConsecutiveFramingErrors: number;
}

export const DEFAULT_BACKPRESSURE_POLICY: Readonly<BackpressurePolicy> = {
  maxBufferedBytes: 10 * 1024 * 1024,
  maxMessagesPerPush: 100,
  maxFrameBodyBytes: 10 * 1024 * 1024,
  maxConsecutiveFramingErrors: 10,
};
