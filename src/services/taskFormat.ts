import type { TaskPriority, TaskRecord, TaskReminder } from "../state/types";
import type { TaskExtraField } from "./settings";
import { dateParts, isValidTimeZone } from "./exportUtils";
import { escapeMarkdown } from "./markdownEscape";

export type TaskFormatOptions = {
  timeZone: string;
  extraFields: TaskExtraField[];
  onInvalidZone?: (zone: string, fallback: string) => void;
};

const PRIORITY_GLYPHS: Record<TaskPriority, string> = {
  high: "⏫",
  medium: "🔼",
  low: "🔽",
};

const formatMoment = (epochMs: number, timeZone: string, withTime: boolean) => {
  const p = dateParts(epochMs, timeZone);
  const date = `${p.year}-${p.month}-${p.day}`;
  return withTime ? `${date} ${p.hour}:${p.minute} ${p.offset}` : date;
};

// Unknown zone names fall back to the surrounding zone.
const resolveZone = (zone: string | null | undefined, fallback: string, options: TaskFormatOptions) => {
  if (!zone) return fallback;
  if (isValidTimeZone(zone)) return zone;
  options.onInvalidZone?.(zone, fallback);
  return fallback;
};

const formatReminder = (reminder: TaskReminder, fallbackZone: string, options: TaskFormatOptions) => {
  const bell = reminder.status === "active" ? "🔔" : "🔕";
  return `${bell} ${formatMoment(reminder.date, resolveZone(reminder.timeZone, fallbackZone, options), true)}`;
};

export const formatTask = (task: TaskRecord, options: TaskFormatOptions) => {
  const zone = resolveZone(task.timeZone, options.timeZone, options);
  const parts = [`- [${task.status === "completed" ? "x" : " "}]`];
  if (task.flagged) parts.push("🚩");
  if (task.priority) parts.push(PRIORITY_GLYPHS[task.priority]);
  parts.push(escapeMarkdown(task.label.replace(/\s+/g, " ").trim()));
  if (typeof task.dueDate === "number") {
    parts.push(`📅 ${formatMoment(task.dueDate, zone, task.dueDateHasTime ?? true)}`);
  }
  task.reminders.forEach((reminder) => parts.push(formatReminder(reminder, zone, options)));

  const extras = options.extraFields;
  if (extras.includes("assignee") && task.assignee) parts.push(`👤 ${escapeMarkdown(task.assignee)}`);
  if (extras.includes("overdue") && task.overdue) parts.push("⚠️");
  if (extras.includes("description") && task.description?.trim()) {
    parts.push(`(${escapeMarkdown(task.description.replace(/\s+/g, " ").trim())})`);
  }
  return parts.join(" ");
};

// Keyed by group id, tasks kept in record order.
export const formatTaskGroups = (tasks: TaskRecord[], options: TaskFormatOptions) => {
  const groups = new Map<string, string[]>();
  tasks.forEach((task) => {
    const lines = groups.get(task.groupId) ?? [];
    lines.push(formatTask(task, options));
    groups.set(task.groupId, lines);
  });
  return groups;
};
