import type { DeliverPrompt, DeliveryResult, PromptRequest } from "../dispatch/deliverPrompt";
import { DispatchLoop } from "../dispatch/dispatchLoop";
import { NotFoundError, StoreUnavailableError } from "../errors";
import { MemoryLedgerStore } from "./support/memoryLedgerStore";
import { seedHabit, seedSchedule } from "./support/fixtures";

const OPTIONS = { tickIntervalMs: 60_000, deliveryTimeoutMs: 10_000 };

const at = (iso: string) => new Date(iso);

function okDelivery() {
  return jest.fn(async (_prompt: PromptRequest, _signal: AbortSignal): Promise<DeliveryResult> => ({ ok: true }));
}

beforeEach(() => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe("DispatchLoop.tick", () => {
  test("delivers a due schedule once and records the firing", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "09:00");
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const report = await loop.tick(at("2026-03-10T09:01:00Z"));

    expect(report).toMatchObject({ due: 1, fired: 1, conflicts: 0, failed: 0, cancelled: 0 });
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver.mock.calls[0][0]).toEqual({ habit, schedule, fireDate: "2026-03-10" });
    expect([...store.firings.keys()]).toEqual([`${schedule.id}:2026-03-10`]);
  });

  test("two ticks in immediate succession deliver only once", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);
    const now = at("2026-03-10T09:01:00Z");

    await loop.tick(now);
    const second = await loop.tick(now);

    expect(second.due).toBe(0);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  test("concurrent tick() calls share the running tick", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);
    const now = at("2026-03-10T09:01:00Z");

    const [a, b] = await Promise.all([loop.tick(now), loop.tick(now)]);

    expect(a).toBe(b);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  test("failed delivery leaves the schedule due for the next tick", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = jest
      .fn<Promise<DeliveryResult>, [PromptRequest, AbortSignal]>()
      .mockResolvedValueOnce({ ok: false, reason: "platform rejected message" })
      .mockResolvedValueOnce({ ok: true });
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const first = await loop.tick(at("2026-03-10T09:01:00Z"));
    expect(first).toMatchObject({ due: 1, fired: 0, failed: 1 });
    expect(store.firings.size).toBe(0);

    const second = await loop.tick(at("2026-03-10T09:02:00Z"));
    expect(second).toMatchObject({ due: 1, fired: 1, failed: 0 });
    expect(deliver).toHaveBeenCalledTimes(2);
  });

  test("thrown delivery errors count as failures and do not block other schedules", async () => {
    const store = new MemoryLedgerStore();
    const first = await seedHabit(store, { name: "Read" });
    const second = await seedHabit(store, { name: "Run" });
    await seedSchedule(store, first, "08:00");
    const ok = await seedSchedule(store, second, "08:00");
    const deliver: DeliverPrompt = async prompt => {
      if (prompt.habit.id === first.id) throw new Error("socket hang up");
      return { ok: true };
    };
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const report = await loop.tick(at("2026-03-10T09:00:00Z"));

    expect(report).toMatchObject({ due: 2, fired: 1, failed: 1 });
    expect([...store.firings.keys()]).toEqual([`${ok.id}:2026-03-10`]);
  });

  test("store errors on one schedule are isolated", async () => {
    const store = new MemoryLedgerStore();
    const a = await seedHabit(store, { name: "Read" });
    const b = await seedHabit(store, { name: "Run" });
    await seedSchedule(store, a, "08:00");
    await seedSchedule(store, b, "08:00");
    jest.spyOn(store, "claimFiring").mockRejectedValueOnce(new Error("connection terminated"));
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const report = await loop.tick(at("2026-03-10T09:00:00Z"));

    expect(report).toMatchObject({ due: 2, fired: 1, failed: 1 });
    expect(deliver).toHaveBeenCalledTimes(1);
    expect(deliver.mock.calls[0][0].habit.id).toBe(b.id);
  });

  test("a delivery that never answers is bounded by the timeout", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    let aborted = false;
    const deliver: DeliverPrompt = (_prompt, signal) =>
      new Promise<DeliveryResult>(() => {
        signal.addEventListener("abort", () => {
          aborted = true;
        });
      });
    const loop = new DispatchLoop(store, deliver, { tickIntervalMs: 60_000, deliveryTimeoutMs: 20 });

    const report = await loop.tick(at("2026-03-10T09:01:00Z"));

    expect(report).toMatchObject({ due: 1, fired: 0, failed: 1 });
    expect(aborted).toBe(true);
    expect(store.firings.size).toBe(0);
  });

  test("restart recomputes from persisted firings, not memory", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = okDelivery();

    await new DispatchLoop(store, deliver, OPTIONS).tick(at("2026-03-10T09:01:00Z"));
    const afterRestart = await new DispatchLoop(store, deliver, OPTIONS).tick(at("2026-03-10T09:30:00Z"));

    expect(afterRestart.due).toBe(0);
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  test("two loops on the same store never double-fire", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = jest.fn(async (): Promise<DeliveryResult> => {
      await new Promise(resolve => setImmediate(resolve));
      return { ok: true };
    });
    const now = at("2026-03-10T09:01:00Z");

    const [a, b] = await Promise.all([
      new DispatchLoop(store, deliver, OPTIONS).tick(now),
      new DispatchLoop(store, deliver, OPTIONS).tick(now),
    ]);

    expect(deliver).toHaveBeenCalledTimes(1);
    expect(a.fired + b.fired).toBe(1);
    expect(store.firings.size).toBe(1);
  });
});

describe("firing claims", () => {
  test("concurrent claims for the same pair: one delivers, the other sees a conflict", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "09:00");
    const record = { scheduleId: schedule.id, fireDate: "2026-03-10", firedAt: at("2026-03-10T09:01:00Z") };
    const firstDeliver = jest.fn(async () => {
      await new Promise(resolve => setImmediate(resolve));
      return true;
    });
    const secondDeliver = jest.fn(async () => true);

    const results = await Promise.all([
      store.claimFiring(record, firstDeliver),
      store.claimFiring(record, secondDeliver),
    ]);

    expect(results).toEqual(["fired", "conflict"]);
    expect(firstDeliver).toHaveBeenCalledTimes(1);
    expect(secondDeliver).not.toHaveBeenCalled();
  });

  test("a rolled-back claim lets the waiting claimer deliver", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "09:00");
    const record = { scheduleId: schedule.id, fireDate: "2026-03-10", firedAt: at("2026-03-10T09:01:00Z") };

    const results = await Promise.all([
      store.claimFiring(record, async () => false),
      store.claimFiring(record, async () => true),
    ]);

    expect(results).toEqual(["not_delivered", "fired"]);
  });
});

describe("DispatchLoop lifecycle", () => {
  test("start aborts when the store is unreachable", async () => {
    const store = new MemoryLedgerStore();
    store.unreachable = true;
    const loop = new DispatchLoop(store, okDelivery(), OPTIONS);

    await expect(loop.start()).rejects.toBeInstanceOf(StoreUnavailableError);
    expect(loop.isRunning).toBe(false);
  });

  test("start runs a first tick immediately and stop ends the loop", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "09:00");
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, { ...OPTIONS, clock: () => at("2026-03-10T10:00:00Z") });

    const report = await loop.start();
    expect(report).toMatchObject({ due: 1, fired: 1 });
    expect(loop.isRunning).toBe(true);

    await loop.stop();
    expect(loop.isRunning).toBe(false);
  });

  test("stop lets the in-flight delivery commit and cancels the rest", async () => {
    const store = new MemoryLedgerStore();
    const a = await seedHabit(store, { name: "Read" });
    const b = await seedHabit(store, { name: "Run" });
    const first = await seedSchedule(store, a, "08:00");
    await seedSchedule(store, b, "08:00");

    let openGate: () => void = () => undefined;
    const gate = new Promise<void>(resolve => {
      openGate = () => resolve();
    });
    let markCalled: () => void = () => undefined;
    const called = new Promise<void>(resolve => {
      markCalled = () => resolve();
    });
    const deliver = jest.fn(async (): Promise<DeliveryResult> => {
      markCalled();
      await gate;
      return { ok: true };
    });
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const tick = loop.tick(at("2026-03-10T09:00:00Z"));
    await called;
    const stopped = loop.stop();
    openGate();
    const report = await tick;
    await stopped;

    expect(report).toMatchObject({ due: 2, fired: 1, cancelled: 1 });
    expect(deliver).toHaveBeenCalledTimes(1);
    expect([...store.firings.keys()]).toEqual([`${first.id}:2026-03-10`]);
  });
});

describe("DispatchLoop.dispatchNow", () => {
  test("sends today's prompt before its time, once", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "21:00");
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);
    const now = at("2026-03-10T09:00:00Z");

    expect(await loop.dispatchNow(schedule.id, now)).toBe("fired");
    expect(await loop.dispatchNow(schedule.id, now)).toBe("conflict");
    expect(deliver).toHaveBeenCalledTimes(1);

    const later = await loop.tick(at("2026-03-10T21:30:00Z"));
    expect(later.due).toBe(0);
  });

  test("inactive or unknown schedules are not found", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "21:00");
    await store.setScheduleActive(schedule.id, false);
    const loop = new DispatchLoop(store, okDelivery(), OPTIONS);

    await expect(loop.dispatchNow(schedule.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(loop.dispatchNow(999)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("skipCompleted", () => {
  async function completedToday() {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    const schedule = await seedSchedule(store, habit, "21:00");
    await store.upsertCompletion({
      habitId: habit.id,
      day: "2026-03-10",
      outcome: "completed",
      recordedAt: at("2026-03-10T08:00:00Z"),
    });
    return { store, habit, schedule };
  }

  test("a day already marked completed is recorded as fired without a prompt", async () => {
    const { store, schedule } = await completedToday();
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, { ...OPTIONS, skipCompleted: true });

    const report = await loop.tick(at("2026-03-10T21:01:00Z"));

    expect(report).toMatchObject({ due: 1, fired: 0, alreadyCompleted: 1, failed: 0 });
    expect(deliver).not.toHaveBeenCalled();
    expect([...store.firings.keys()]).toEqual([`${schedule.id}:2026-03-10`]);
    expect((await loop.tick(at("2026-03-10T21:05:00Z"))).due).toBe(0);
  });

  test("off by default: the prompt is still sent", async () => {
    const { store } = await completedToday();
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, OPTIONS);

    const report = await loop.tick(at("2026-03-10T21:01:00Z"));

    expect(report).toMatchObject({ due: 1, fired: 1, alreadyCompleted: 0 });
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  test("a skipped answer does not suppress the prompt", async () => {
    const store = new MemoryLedgerStore();
    const habit = await seedHabit(store);
    await seedSchedule(store, habit, "21:00");
    await store.upsertCompletion({ habitId: habit.id, day: "2026-03-10", outcome: "skipped", recordedAt: at("2026-03-10T08:00:00Z") });
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, { ...OPTIONS, skipCompleted: true });

    expect(await loop.tick(at("2026-03-10T21:01:00Z"))).toMatchObject({ fired: 1, alreadyCompleted: 0 });
    expect(deliver).toHaveBeenCalledTimes(1);
  });

  test("dispatchNow reports the completed day", async () => {
    const { store, schedule } = await completedToday();
    const deliver = okDelivery();
    const loop = new DispatchLoop(store, deliver, { ...OPTIONS, skipCompleted: true });

    expect(await loop.dispatchNow(schedule.id, at("2026-03-10T09:00:00Z"))).toBe("already_completed");
    expect(deliver).not.toHaveBeenCalled();
  });
});
