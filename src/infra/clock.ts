export interface ClockPort {
  nowMs(): number;
  nowIso(): string;
}

export class SystemClock implements ClockPort {
  nowMs(): number {
    return Date.now();
  }

  nowIso(): string {
    return new Date().toISOString();
  }
}

export function unixSeconds(clock: ClockPort): number {
  return Math.floor(clock.nowMs() / 1000);
}
