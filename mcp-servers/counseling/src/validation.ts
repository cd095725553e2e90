import { ObjectId } from "mongodb";
import { z } from "zod";
import { VALID_TASK_TRANSITIONS } from "./constants.js";
import { ValidationError } from "./errors.js";
import type { TaskStatus } from "./types.js";

export const objectIdString = z.string().regex(/^[0-9a-fA-F]{24}$/, "Expected a 24-character hex id");

export function toObjectId(hex: string, label: string): ObjectId {
  if (!/^[0-9a-fA-F]{24}$/.test(hex)) {
    throw new ValidationError(`${label} "${hex}" is not a valid id.`);
  }
  return new ObjectId(hex);
}

export function isValidTaskTransition(from: TaskStatus, to: TaskStatus): boolean {
  return VALID_TASK_TRANSITIONS[from].includes(to);
}

export function validateSchedule(start: Date, end: Date): void {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new ValidationError("Meeting start and end must be valid dates.");
  }
  if (end.getTime() <= start.getTime()) {
    throw new ValidationError("Meeting end must be after its start.");
  }
}

export function durationMinutes(start: Date, end: Date): number {
  return Math.round((end.getTime() - start.getTime()) / 60_000);
}

export function includesId(ids: ObjectId[], id: ObjectId): boolean {
  return ids.some(candidate => candidate.equals(id));
}

/** Sorts by `order`, keeping the given sequence for equal orders. */
export function byOrder<T extends { _id: ObjectId; order: number }>(docs: T[], sequence: ObjectId[]): T[] {
  const position = new Map(sequence.map((id, index) => [id.toHexString(), index]));
  const rank = (doc: T) => position.get(doc._id.toHexString()) ?? sequence.length;
  return [...docs].sort((a, b) => a.order - b.order || rank(a) - rank(b));
}
