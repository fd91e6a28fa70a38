/**
 * Time and process info port.
 *
 * Purpose:
 * - Lock file timestamps and stale-lock detection
 * - Retry backoff and lock polling delays
 * - Process id for lock file metadata
 *
 * Injectable so tests never wait on real timers.
 */
export interface TimeClockPort {
  /** Milliseconds since Unix epoch. */
  nowMs(): number;

  /** Current process id (lock file metadata). */
  getPid(): number;

  /** Resolve after `ms` milliseconds. */
  sleep(ms: number): Promise<void>;
}
