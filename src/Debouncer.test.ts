import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Debouncer } from "./Debouncer";
import { silentLogger } from "./logger";

describe("Debouncer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("runs the task after the quiet period", () => {
    const debouncer = new Debouncer(500, silentLogger);
    const task = vi.fn();

    debouncer.schedule(task);
    vi.advanceTimersByTime(499);
    expect(task).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("only runs the last scheduled task", () => {
    const debouncer = new Debouncer(500, silentLogger);
    const first = vi.fn();
    const second = vi.fn();

    debouncer.schedule(first);
    debouncer.schedule(second);
    vi.advanceTimersByTime(1000);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it("restarts the quiet period on every schedule", () => {
    const debouncer = new Debouncer(500, silentLogger);
    const task = vi.fn();

    debouncer.schedule(task);
    vi.advanceTimersByTime(400);
    debouncer.schedule(task);
    vi.advanceTimersByTime(400);
    expect(task).not.toHaveBeenCalled();

    vi.advanceTimersByTime(100);
    expect(task).toHaveBeenCalledTimes(1);
  });

  it("numbers each scheduling", () => {
    const debouncer = new Debouncer(10, silentLogger);
    expect(debouncer.schedule(() => {})).toBe(1);
    expect(debouncer.schedule(() => {})).toBe(2);
  });

  it("cancels a pending task", () => {
    const debouncer = new Debouncer(500, silentLogger);
    const task = vi.fn();

    debouncer.schedule(task);
    expect(debouncer.isPending()).toBe(true);
    debouncer.cancel();
    expect(debouncer.isPending()).toBe(false);
    vi.advanceTimersByTime(1000);

    expect(task).not.toHaveBeenCalled();
  });

  it("reports a failing task instead of throwing", () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn() };
    const debouncer = new Debouncer(100, logger);
    const failure = new Error("disk full");

    debouncer.schedule(() => {
      throw failure;
    });
    expect(() => vi.advanceTimersByTime(100)).not.toThrow();

    expect(logger.warn).toHaveBeenCalledWith(
      "Debounced task #1 failed:",
      failure
    );
    expect(debouncer.isPending()).toBe(false);
  });
});
