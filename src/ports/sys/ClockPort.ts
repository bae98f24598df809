/**
 * Monotonic time source. Readings are nanoseconds from an arbitrary origin
 * and never go backwards within a process.
 */
export interface ClockPort {
  now(): bigint;
}
