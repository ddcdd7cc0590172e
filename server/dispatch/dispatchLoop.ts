import { NotFoundError, StoreUnavailableError } from "../errors";
import { dueSchedules, type DueSchedule } from "../schedule/dueSchedules";
import type { ClaimResult, LedgerStore } from "../types/ledger";
import { toLocalDateString } from "../validation";
import type { DeliverPrompt, DeliveryResult } from "./deliverPrompt";

export interface DispatchLoopOptions {
  tickIntervalMs: number;
  deliveryTimeoutMs: number;
  backfillDays?: number;
  /** Record the firing without prompting when the day is already marked completed. */
  skipCompleted?: boolean;
  clock?: () => Date;
}

export interface TickReport {
  startedAt: Date;
  due: number;
  fired: number;
  conflicts: number;
  failed: number;
  cancelled: number;
  alreadyCompleted: number;
}

export type DispatchOutcome = ClaimResult | "already_completed" | "error";

export class DispatchLoop {
  private timer: NodeJS.Timeout | null = null;
  private current: Promise<TickReport> | null = null;
  private running = false;
  private stopping = false;
  private readonly clock: () => Date;

  constructor(
    private readonly store: LedgerStore,
    private readonly deliver: DeliverPrompt,
    private readonly options: DispatchLoopOptions,
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Verifies the store, runs a first tick, then ticks every `tickIntervalMs`. */
  async start(): Promise<TickReport | null> {
    if (this.running) throw new Error("dispatch loop already running");
    try {
      await this.store.ping();
    } catch (err) {
      throw new StoreUnavailableError(err);
    }
    this.running = true;
    this.stopping = false;
    console.log(`[dispatch] started, tick every ${this.options.tickIntervalMs}ms`);
    let report: TickReport | null = null;
    try {
      report = await this.tick();
    } catch (err) {
      console.error("[dispatch] first tick failed:", err);
    }
    this.scheduleNext();
    return report;
  }

  /** Stops ticking; resolves once the in-flight tick has finished its writes. */
  async stop(): Promise<void> {
    this.stopping = true;
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.current) await this.current;
    console.log("[dispatch] stopped");
  }

  /** Concurrent calls share the tick already in progress. */
  tick(now: Date = this.clock()): Promise<TickReport> {
    if (!this.current) {
      this.current = this.runTick(now).finally(() => {
        this.current = null;
      });
    }
    return this.current;
  }

  /** Sends today's prompt for one schedule regardless of its time of day. */
  async dispatchNow(scheduleId: number, now: Date = this.clock()): Promise<DispatchOutcome> {
    const schedule = await this.store.getSchedule(scheduleId);
    if (!schedule || !schedule.active) throw new NotFoundError("schedule", scheduleId);
    const habit = await this.store.getHabit(schedule.habitId);
    if (!habit) throw new NotFoundError("habit", schedule.habitId);
    return this.dispatchOne({ habit, schedule, fireDate: toLocalDateString(now, schedule.timezone) }, now);
  }

  private scheduleNext(): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.tick()
        .catch(err => console.error("[dispatch] tick failed:", err))
        .finally(() => this.scheduleNext());
    }, this.options.tickIntervalMs);
  }

  private async runTick(now: Date): Promise<TickReport> {
    const report: TickReport = {
      startedAt: now,
      due: 0,
      fired: 0,
      conflicts: 0,
      failed: 0,
      cancelled: 0,
      alreadyCompleted: 0,
    };
    const due = await dueSchedules(this.store, now, { backfillDays: this.options.backfillDays });
    report.due = due.length;

    for (let i = 0; i < due.length; i++) {
      if (this.stopping) {
        report.cancelled = due.length - i;
        break;
      }
      const outcome = await this.dispatchOne(due[i], now);
      if (outcome === "fired") report.fired++;
      else if (outcome === "already_completed") report.alreadyCompleted++;
      else if (outcome === "conflict") report.conflicts++;
      else report.failed++;
    }

    if (report.due > 0) {
      console.log(
        `[dispatch] tick ${now.toISOString()}: due=${report.due} fired=${report.fired} ` +
          `conflicts=${report.conflicts} failed=${report.failed} cancelled=${report.cancelled} ` +
          `alreadyCompleted=${report.alreadyCompleted}`,
      );
    }
    return report;
  }

  private async dispatchOne(entry: DueSchedule, now: Date): Promise<DispatchOutcome> {
    const label = `schedule ${entry.schedule.id} (habit ${entry.habit.id}) for ${entry.fireDate}`;
    let failure: string | null = null;
    let completedAlready = false;
    try {
      const result = await this.store.claimFiring(
        { scheduleId: entry.schedule.id, fireDate: entry.fireDate, firedAt: now },
        async () => {
          if (this.options.skipCompleted && (await this.isCompleted(entry))) {
            completedAlready = true;
            return true;
          }
          const delivery = await this.deliverWithTimeout(entry);
          if (!delivery.ok) failure = delivery.reason;
          return delivery.ok;
        },
      );
      if (result === "conflict") {
        console.log(`[dispatch] ${label} already handled`);
      } else if (result === "not_delivered") {
        console.error(`[dispatch] delivery failed for ${label}: ${failure ?? "unknown"}; retrying next tick`);
      } else if (completedAlready) {
        console.log(`[dispatch] ${label} already completed, prompt not sent`);
        return "already_completed";
      }
      return result;
    } catch (err) {
      console.error(`[dispatch] error dispatching ${label}:`, err);
      return "error";
    }
  }

  private async isCompleted(entry: DueSchedule): Promise<boolean> {
    const records = await this.store.listCompletions(entry.habit.id, { from: entry.fireDate, to: entry.fireDate });
    return records.some(r => r.outcome === "completed");
  }

  private async deliverWithTimeout(entry: DueSchedule): Promise<DeliveryResult> {
    const controller = new AbortController();
    const timeoutMs = this.options.deliveryTimeoutMs;
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<DeliveryResult>(resolve => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({ ok: false, reason: `timed out after ${timeoutMs}ms` });
      }, timeoutMs);
    });
    try {
      return await Promise.race([this.deliver(entry, controller.signal), timeout]);
    } catch (err) {
      return { ok: false, reason: err instanceof Error ? err.message : String(err) };
    } finally {
      clearTimeout(timer);
    }
  }
}
