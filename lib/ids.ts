import { Types } from 'mongoose';
import { InvalidIdentifierError } from '@/lib/errors';

const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/i;

export function isPublicId(id: string) {
  return OBJECT_ID_PATTERN.test(id);
}

/** Parses a public id into an ObjectId; throws before any query is issued. */
export function toObjectId(id: string, resource: string) {
  if (!isPublicId(id)) {
    throw new InvalidIdentifierError(resource);
  }
  return new Types.ObjectId(id);
}

export function toPublicId(id: Types.ObjectId) {
  return id.toHexString();
}
