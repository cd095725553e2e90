import type { ObjectId } from "mongodb";
import { NotFoundError } from "../../errors.js";
import { toObjectId } from "../../validation.js";

/** Parses referenced ids and checks each one exists. */
export async function resolveReferences(
  ids: string[],
  load: (ids: ObjectId[]) => Promise<{ _id: ObjectId }[]>,
  entity: string,
): Promise<ObjectId[]> {
  const objectIds = ids.map(id => toObjectId(id, `${entity} id`));
  if (objectIds.length === 0) return [];
  const known = new Set((await load(objectIds)).map(doc => doc._id.toHexString()));
  const missing = objectIds.find(id => !known.has(id.toHexString()));
  if (missing) throw new NotFoundError(entity, missing.toHexString());
  return objectIds;
}
