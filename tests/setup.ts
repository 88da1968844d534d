import { vi, afterEach, afterAll } from "vitest";

// Mock console methods to reduce test output noise
global.console = {
  ...console,
  log: vi.fn(),
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  // Keep error for debugging failed tests
  error: console.error
};

process.env.NODE_ENV = "test";

// Heartbeats, backoff and retention all run on timers
vi.useFakeTimers();

afterEach(() => {
  vi.clearAllMocks();
  vi.clearAllTimers();
});

afterAll(() => {
  vi.useRealTimers();
});
