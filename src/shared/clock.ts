import { config } from './config';

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

export function nowMs(): number {
  return getNow().getTime();
}

export function nowSeconds(): number {
  return Math.floor(nowMs() / 1000);
}

// Moves the test clock forward; no-op outside tests
export function advanceTestClock(ms: number): void {
  setTestNow(new Date(nowMs() + ms));
}

// Lets HTTP tests pin the clock per request through an X-Test-Now header
export function parseTestNowHeader(header: string | undefined): void {
  if (config.isTest && header) {
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
