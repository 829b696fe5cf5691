import { config } from './config';

export interface Clock {
  now(): Date;
}

let testNow: Date | null = null;

export function setTestNow(date: Date | null): void {
  if (config.isTest) {
    testNow = date;
  }
}

export function getNow(): Date {
  if (config.isTest && testNow) {
    return testNow;
  }
  return new Date();
}

export function parseTestNowHeader(header: string | undefined): void {
  if (config.isTest && header) {
    // Check if it's purely numeric (timestamp in milliseconds)
    if (/^\d+$/.test(header)) {
      testNow = new Date(parseInt(header, 10));
    } else {
      const parsed = new Date(header);
      if (!isNaN(parsed.getTime())) {
        testNow = parsed;
      }
    }
  }
}

export const systemClock: Clock = { now: getNow };

export function nowSeconds(clock: Clock): number {
  return Math.floor(clock.now().getTime() / 1000);
}
