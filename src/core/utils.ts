import { randomUUID } from "node:crypto";
import path from "node:path";

export function isoNow(): string {
  return new Date().toISOString();
}

export function newTaskId(): string {
  return randomUUID().replace(/-/g, "");
}

export function secondsToMs(seconds: number): number {
  return Math.round(seconds * 1000);
}

export function elapsedMs(fromIso: string, now: Date): number {
  return now.getTime() - Date.parse(fromIso);
}

export function isInsideDir(baseDir: string, targetPath: string): boolean {
  const relative = path.relative(path.resolve(baseDir), path.resolve(targetPath));
  return relative !== "" && !relative.startsWith("..") && !path.isAbsolute(relative);
}

export type Clock = {
  now(): Date;
};

export const systemClock: Clock = {
  now: () => new Date(),
};
