import { randomUUID } from 'node:crypto';

export const NIL_UUID = '00000000-0000-0000-0000-000000000000';

export const UUID_REGEX =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Random RFC 4122 version 4 identifier in canonical lowercase form.
 */
export function uuidv4(): string {
  return randomUUID();
}

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}
