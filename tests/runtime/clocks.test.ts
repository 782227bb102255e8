import {
  afterEach,
  beforeEach,
  describe,
  expect,
  jest,
  test,
} from "@jest/globals";

import { CountdownClock, IntervalClock } from "@/runtime/clocks";

describe("@/runtime/clocks — IntervalClock", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test("fires once per period while running", () => {
    const onFire = jest.fn();
    const clock = new IntervalClock("gravity", 100, onFire);
    expect(clock.running).toBe(false);
    clock.start();
    jest.advanceTimersByTime(350);
    expect(onFire).toHaveBeenCalledTimes(3);
    expect(clock.running).toBe(true);
  });

  test("stop is idempotent and halts firing", () => {
    const onFire = jest.fn();
    const clock = new IntervalClock("gravity", 100, onFire);
    clock.start();
    jest.advanceTimersByTime(100);
    clock.stop();
    clock.stop();
    jest.advanceTimersByTime(1000);
    expect(onFire).toHaveBeenCalledTimes(1);
    expect(clock.running).toBe(false);
  });

  test("stop from inside a firing drops later firings", () => {
    const clock: IntervalClock = new IntervalClock("gravity", 50, () => {
      clock.stop();
    });
    const spy = jest.spyOn(clock, "stop");
    clock.start();
    jest.advanceTimersByTime(500);
    expect(spy).toHaveBeenCalledTimes(1);
  });

  test("setPeriod restarts a running clock on the new period", () => {
    const onFire = jest.fn();
    const clock = new IntervalClock("gravity", 600, onFire);
    clock.start();
    jest.advanceTimersByTime(500);
    clock.setPeriod(200);
    expect(clock.period).toBe(200);
    jest.advanceTimersByTime(200);
    expect(onFire).toHaveBeenCalledTimes(1);
  });

  test("setPeriod on a stopped clock does not start it", () => {
    const clock = new IntervalClock("gravity", 600, jest.fn());
    clock.setPeriod(300);
    expect(clock.running).toBe(false);
  });
});

describe("@/runtime/clocks — CountdownClock", () => {
  beforeEach(() => {
    jest.useFakeTimers();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  test("counts down once per tick and expires once", () => {
    const onTick = jest.fn();
    const onExpire = jest.fn();
    const clock = new CountdownClock(3, 1000, { onExpire, onTick });
    clock.restart();
    jest.advanceTimersByTime(2000);
    expect(clock.remaining).toBe(1);
    expect(onTick.mock.calls).toEqual([[2], [1]]);
    jest.advanceTimersByTime(5000);
    expect(clock.remaining).toBe(0);
    expect(onExpire).toHaveBeenCalledTimes(1);
    expect(clock.running).toBe(false);
  });

  test("restart resets to the full length", () => {
    const clock = new CountdownClock(30, 1000, { onExpire: jest.fn() });
    clock.restart();
    jest.advanceTimersByTime(10_000);
    expect(clock.remaining).toBe(20);
    clock.restart();
    expect(clock.remaining).toBe(30);
    jest.advanceTimersByTime(1000);
    expect(clock.remaining).toBe(29);
  });

  test("suspended ticks are ignored", () => {
    const onExpire = jest.fn();
    const clock = new CountdownClock(2, 1000, { onExpire });
    clock.restart();
    clock.setSuspended(true);
    jest.advanceTimersByTime(10_000);
    expect(clock.remaining).toBe(2);
    clock.setSuspended(false);
    jest.advanceTimersByTime(2000);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  test("stop prevents expiry; reset restores the counter", () => {
    const onExpire = jest.fn();
    const clock = new CountdownClock(2, 1000, { onExpire });
    clock.restart();
    jest.advanceTimersByTime(1000);
    clock.stop();
    clock.stop();
    jest.advanceTimersByTime(5000);
    expect(onExpire).not.toHaveBeenCalled();
    expect(clock.remaining).toBe(1);
    clock.reset();
    expect(clock.remaining).toBe(2);
  });
});
