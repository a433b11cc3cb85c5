/** Milliseconds between the unix epoch and the CoreFoundation absolute-time epoch, 2001-01-01T00:00:00Z. */
export const cfAbsoluteTimeEpochMilliseconds = 978_307_200_000;
