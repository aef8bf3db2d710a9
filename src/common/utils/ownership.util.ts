import { ForbiddenException, NotFoundException } from '@nestjs/common';

export interface Owned {
  ownerId: number;
}

/**
 * Returns the record when it exists and belongs to `ownerId`.
 *
 * @throws NotFoundException "<Entity> not found"
 * @throws ForbiddenException "Not authorized to <action> this <entity>"
 */
export function assertOwnership<T extends Owned>(
  record: T | undefined,
  ownerId: number,
  entity: string,
  action = 'access',
): T {
  if (!record) {
    throw new NotFoundException(`${entity} not found`);
  }
  if (record.ownerId !== ownerId) {
    throw new ForbiddenException(`Not authorized to ${action} this ${entity.toLowerCase()}`);
  }
  return record;
}

/** Formats ids the way error messages list them, e.g. `[3, 7]`. */
export function formatIds(ids: readonly number[]): string {
  return `[${ids.join(', ')}]`;
}
