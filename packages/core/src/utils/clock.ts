/**
 * Source of the current time. Injected wherever "now" matters so that day
 * boundaries are deterministic in tests.
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
