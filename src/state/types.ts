export interface NotebookRecord {
  id: string;
  name: string;
  stack: string | null;
}

export interface NoteResource {
  id: string;
  hash: string;
  mime: string;
  fileName: string | null;
  size: number;
  width?: number | null;
  height?: number | null;
}

export type ReminderStatus = "active" | "muted";

export interface TaskReminder {
  date: number;
  timeZone?: string | null;
  status: ReminderStatus;
}

export type TaskPriority = "low" | "medium" | "high";

export interface TaskRecord {
  id: string;
  groupId: string;
  label: string;
  status: "open" | "completed";
  flagged: boolean;
  priority?: TaskPriority | null;
  dueDate?: number | null;
  dueDateHasTime?: boolean;
  timeZone?: string | null;
  reminders: TaskReminder[];
  assignee?: string | null;
  description?: string | null;
  overdue?: boolean;
}

export interface GeoLocation {
  latitude: number;
  longitude: number;
  altitude?: number | null;
}

export interface NoteRecord {
  id: string;
  title: string;
  content: string;
  notebookId: string;
  createdAt: number | null;
  updatedAt: number | null;
  tags: string[];
  author?: string | null;
  sourceUrl?: string | null;
  location?: GeoLocation | null;
  resources: NoteResource[];
  tasks: TaskRecord[];
}

export interface NoteSelection {
  notebooks: NotebookRecord[];
  notes: NoteRecord[];
}
