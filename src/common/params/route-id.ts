import { NotFoundException } from '@nestjs/common';

/** Ids are Postgres INTEGER (int4) serials. */
export const MAX_ENTITY_ID = 2_147_483_647;

/** Ids in paths are positive integers within the id column's range; anything else addresses nothing. */
export function parseRouteId(raw: string, notFoundMessage: string): number {
  if (!/^\d{1,10}$/.test(raw)) throw new NotFoundException(notFoundMessage);
  const id = Number(raw);
  if (id < 1 || id > MAX_ENTITY_ID) throw new NotFoundException(notFoundMessage);
  return id;
}
