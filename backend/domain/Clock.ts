// Every "now" in the engine goes through an injected clock so tests can pin time.
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
