export const isoNow = (): string => new Date().toISOString();

export const DAY_SECONDS = 24 * 60 * 60;

/** Seconds since the epoch, as the chain clocks count them. */
export const unixNow = (): number => Math.floor(Date.now() / 1000);
