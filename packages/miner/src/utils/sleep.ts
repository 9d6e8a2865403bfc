export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms: number) => new Promise(res => setTimeout(res, Math.max(0, ms)))
