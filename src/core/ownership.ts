import { TaskForbiddenError } from "./errors.js";
import type { Task } from "./task.js";

export type Requester = {
  id: string;
  isAdmin: boolean;
};

export function canAccessTask(task: Pick<Task, "owner_id">, requester: Requester): boolean {
  return requester.isAdmin || task.owner_id === requester.id;
}

export function assertTaskAccess(task: Pick<Task, "id" | "owner_id">, requester: Requester): void {
  if (!canAccessTask(task, requester)) {
    throw new TaskForbiddenError(task.id, requester.id);
  }
}
