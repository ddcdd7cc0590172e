import type { Habit, Schedule } from "../types/ledger";

export interface PromptRequest {
  habit: Habit;
  schedule: Schedule;
  fireDate: string;
}

export type DeliveryResult = { ok: true } | { ok: false; reason: string };

/** Sends the day's prompt; `ok` means the platform accepted the message. */
export type DeliverPrompt = (prompt: PromptRequest, signal: AbortSignal) => Promise<DeliveryResult>;

export function promptPayload(prompt: PromptRequest) {
  return {
    userId: prompt.habit.userId,
    habitId: prompt.habit.id,
    habitName: prompt.habit.name,
    scheduleId: prompt.schedule.id,
    timeOfDay: prompt.schedule.timeOfDay,
    timezone: prompt.schedule.timezone,
    fireDate: prompt.fireDate,
    question: `Did you complete "${prompt.habit.name}" today?`,
    options: ["completed", "skipped"],
  };
}

export function createWebhookDelivery(url: string, apiKey?: string): DeliverPrompt {
  return async (prompt, signal) => {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (apiKey) headers.Authorization = `Bearer ${apiKey}`;
    const resp = await fetch(url, {
      method: "POST",
      headers,
      body: JSON.stringify(promptPayload(prompt)),
      signal,
    });
    if (!resp.ok) {
      return { ok: false, reason: `webhook responded ${resp.status}: ${(await resp.text()).slice(0, 200)}` };
    }
    return { ok: true };
  };
}

export const logDelivery: DeliverPrompt = async (prompt) => {
  console.log(
    `[delivery] prompt for habit ${prompt.habit.id} "${prompt.habit.name}" ` +
      `(user ${prompt.habit.userId}, ${prompt.schedule.timeOfDay} ${prompt.schedule.timezone}) on ${prompt.fireDate}`,
  );
  return { ok: true };
};
