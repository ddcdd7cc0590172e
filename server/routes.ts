import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import { listCompletions, recordCompletion } from "./completions/recordCompletion";
import type { DispatchLoop } from "./dispatch/dispatchLoop";
import { LedgerError, ValidationError } from "./errors";
import {
  addSchedule,
  createHabit,
  deleteHabit,
  deleteSchedule,
  getOwnedHabit,
  getOwnedSchedule,
  listSchedules,
  setScheduleActive,
  updateHabit,
} from "./habits";
import { dueSchedules } from "./schedule/dueSchedules";
import { getCurrentStreak, getLifetimeStats, getMonthlyStats, getOverview } from "./streak/computeStreakStats";
import type { LedgerStore } from "./types/ledger";
import { parseId } from "./validation";

export interface RouteDeps {
  store: LedgerStore;
  dispatcher: DispatchLoop;
  apiKey: string | null;
  defaultTimezone: string;
  backfillDays: number;
  now?: () => Date;
}

const DEFAULT_USER_ID = "local_default";

const STATUS_BY_KIND: Record<LedgerError["kind"], number> = {
  not_found: 404,
  duplicate_schedule: 409,
  invalid_date: 400,
  validation: 400,
  store_unavailable: 503,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bodyOf(req: Request): Record<string, unknown> {
  return isRecord(req.body) ? req.body : {};
}

function queryString(req: Request, name: string): string | undefined {
  const v = req.query[name];
  return typeof v === "string" && v !== "" ? v : undefined;
}

function idParam(req: Request, name: string): number {
  const id = parseId(req.params[name]);
  if (id == null) throw new ValidationError([`${name}: expected a positive integer, got "${req.params[name]}"`]);
  return id;
}

function sendError(res: Response, err: unknown, context: string): void {
  if (err instanceof LedgerError) {
    res.status(STATUS_BY_KIND[err.kind]).json({ ok: false, error: err.message, kind: err.kind });
    return;
  }
  console.error(`${context} error:`, err);
  res.status(500).json({ ok: false, error: "Internal server error" });
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { store, dispatcher } = deps;
  const now = deps.now ?? (() => new Date());

  const getUserId = (req: Request): string => req.header("x-user-id") || DEFAULT_USER_ID;

  function requireAuth(req: Request, res: Response, next: NextFunction) {
    if (!deps.apiKey) {
      return res.status(500).json({ error: "Server missing API_KEY" });
    }
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== deps.apiKey) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    next();
  }

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true, dispatching: dispatcher.isRunning });
  });

  app.use("/api", requireAuth);

  app.get("/api/habits", async (req: Request, res: Response) => {
    try {
      const habits = await store.listHabits(getUserId(req));
      res.json({ ok: true, habits });
    } catch (err) {
      sendError(res, err, "list habits");
    }
  });

  app.post("/api/habits", async (req: Request, res: Response) => {
    try {
      const habit = await createHabit(store, getUserId(req), bodyOf(req), {
        defaultTimezone: deps.defaultTimezone,
        now: now(),
      });
      res.status(201).json({ ok: true, habit });
    } catch (err) {
      sendError(res, err, "create habit");
    }
  });

  app.patch("/api/habits/:habitId", async (req: Request, res: Response) => {
    try {
      const habit = await updateHabit(store, getUserId(req), idParam(req, "habitId"), bodyOf(req));
      res.json({ ok: true, habit });
    } catch (err) {
      sendError(res, err, "update habit");
    }
  });

  app.delete("/api/habits/:habitId", async (req: Request, res: Response) => {
    try {
      await deleteHabit(store, getUserId(req), idParam(req, "habitId"));
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "delete habit");
    }
  });

  app.get("/api/habits/:habitId/schedules", async (req: Request, res: Response) => {
    try {
      const schedules = await listSchedules(store, getUserId(req), idParam(req, "habitId"));
      res.json({ ok: true, schedules });
    } catch (err) {
      sendError(res, err, "list schedules");
    }
  });

  app.post("/api/habits/:habitId/schedules", async (req: Request, res: Response) => {
    try {
      const schedule = await addSchedule(store, getUserId(req), idParam(req, "habitId"), bodyOf(req), now());
      res.status(201).json({ ok: true, schedule });
    } catch (err) {
      sendError(res, err, "add schedule");
    }
  });

  app.get("/api/schedules/due", async (req: Request, res: Response) => {
    try {
      const at = queryString(req, "at");
      const instant = at ? new Date(at) : now();
      if (isNaN(instant.getTime())) throw new ValidationError([`at: invalid timestamp "${at}"`]);
      const userId = getUserId(req);
      const due = await dueSchedules(store, instant, { backfillDays: deps.backfillDays });
      res.json({ ok: true, due: due.filter(d => d.habit.userId === userId) });
    } catch (err) {
      sendError(res, err, "due schedules");
    }
  });

  app.patch("/api/schedules/:scheduleId", async (req: Request, res: Response) => {
    try {
      const schedule = await setScheduleActive(store, getUserId(req), idParam(req, "scheduleId"), bodyOf(req).active);
      res.json({ ok: true, schedule });
    } catch (err) {
      sendError(res, err, "update schedule");
    }
  });

  app.delete("/api/schedules/:scheduleId", async (req: Request, res: Response) => {
    try {
      await deleteSchedule(store, getUserId(req), idParam(req, "scheduleId"));
      res.json({ ok: true });
    } catch (err) {
      sendError(res, err, "delete schedule");
    }
  });

  app.post("/api/schedules/:scheduleId/trigger", async (req: Request, res: Response) => {
    try {
      const scheduleId = idParam(req, "scheduleId");
      await getOwnedSchedule(store, getUserId(req), scheduleId);
      const outcome = await dispatcher.dispatchNow(scheduleId, now());
      res.json({ ok: outcome === "fired" || outcome === "conflict" || outcome === "already_completed", outcome });
    } catch (err) {
      sendError(res, err, "trigger schedule");
    }
  });

  app.put("/api/habits/:habitId/completions/:day", async (req: Request, res: Response) => {
    try {
      const habitId = idParam(req, "habitId");
      await getOwnedHabit(store, getUserId(req), habitId);
      const record = await recordCompletion(store, {
        habitId,
        day: req.params.day,
        outcome: bodyOf(req).outcome,
        now: now(),
      });
      res.json({ ok: true, record });
    } catch (err) {
      sendError(res, err, "record completion");
    }
  });

  app.get("/api/habits/:habitId/completions", async (req: Request, res: Response) => {
    try {
      const habitId = idParam(req, "habitId");
      await getOwnedHabit(store, getUserId(req), habitId);
      const records = await listCompletions(store, habitId, {
        from: queryString(req, "from"),
        to: queryString(req, "to"),
      });
      res.json({ ok: true, records });
    } catch (err) {
      sendError(res, err, "list completions");
    }
  });

  app.get("/api/habits/:habitId/streak", async (req: Request, res: Response) => {
    try {
      const habitId = idParam(req, "habitId");
      await getOwnedHabit(store, getUserId(req), habitId);
      const streak = await getCurrentStreak(store, habitId, now(), queryString(req, "asOf"));
      res.json({ ok: true, streak });
    } catch (err) {
      sendError(res, err, "current streak");
    }
  });

  app.get("/api/habits/:habitId/stats/month", async (req: Request, res: Response) => {
    try {
      const habitId = idParam(req, "habitId");
      await getOwnedHabit(store, getUserId(req), habitId);
      const stats = await getMonthlyStats(store, habitId, now(), queryString(req, "month"));
      res.json({ ok: true, stats });
    } catch (err) {
      sendError(res, err, "monthly stats");
    }
  });

  app.get("/api/habits/:habitId/stats/lifetime", async (req: Request, res: Response) => {
    try {
      const habitId = idParam(req, "habitId");
      await getOwnedHabit(store, getUserId(req), habitId);
      const stats = await getLifetimeStats(store, habitId, now());
      res.json({ ok: true, stats });
    } catch (err) {
      sendError(res, err, "lifetime stats");
    }
  });

  app.get("/api/stats/overview", async (req: Request, res: Response) => {
    try {
      const overview = await getOverview(store, getUserId(req), now());
      res.json({ ok: true, overview });
    } catch (err) {
      sendError(res, err, "overview");
    }
  });

  return createServer(app);
}
