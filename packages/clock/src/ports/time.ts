/** Milliseconds since the Unix epoch, or a duration in milliseconds. */
export type Milliseconds = number

/** A duration in whole or fractional seconds. */
export type Seconds = number

export function secondsToMs(seconds: Seconds): Milliseconds {
  return seconds * 1000
}
