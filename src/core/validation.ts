import type { NewTodo, UpdateTodo } from "./entities/todo";
import { ValidationError } from "./errors";
import { toUtcTimestamp } from "./timestamps";

export const TITLE_MAX_LENGTH = 200;
export const DESCRIPTION_MAX_LENGTH = 2000;

// Lengths are counted in code points so that an emoji counts as one character.
const length = (value: string) => Array.from(value).length;

function checkTitle(title: string) {
  const len = length(title.trim());
  if (len === 0 || len > TITLE_MAX_LENGTH) {
    throw new ValidationError(`title must be between 1 and ${TITLE_MAX_LENGTH} characters`, "title");
  }
}

function checkDescription(description: string) {
  if (length(description) > DESCRIPTION_MAX_LENGTH) {
    throw new ValidationError(`description must be at most ${DESCRIPTION_MAX_LENGTH} characters`, "description");
  }
}

export function normalizeDueDate(dueDate: string): string {
  const utc = toUtcTimestamp(dueDate);
  if (utc === null) {
    throw new ValidationError("due_date must be an RFC3339 timestamp between years 0000 and 9999", "due_date");
  }
  return utc;
}

function checkDueDate(dueDate: string) {
  normalizeDueDate(dueDate);
}

export function validateNewTodo(input: NewTodo): void {
  checkTitle(input.title);
  if (input.description !== undefined) checkDescription(input.description);
  if (input.dueDate !== undefined) checkDueDate(input.dueDate);
}

export function validateUpdateTodo(update: UpdateTodo): void {
  if (update.title.kind === "set") checkTitle(update.title.value);
  if (update.description.kind === "set") checkDescription(update.description.value);
  if (update.dueDate.kind === "set") checkDueDate(update.dueDate.value);
}
