import crypto from 'crypto';

export function normalizeStudentName(name: string): string {
  return name.trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Stable student id: first 8 hex chars of the MD5 of the normalized name.
 * Two students with the same name share an id.
 */
export function studentIdFor(name: string): string {
  return crypto.createHash('md5').update(normalizeStudentName(name)).digest('hex').slice(0, 8);
}
