import type { ZodError } from 'zod';

/** Flatten zod issues into one line for a 400 response */
export function issuesOf(error: ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}
