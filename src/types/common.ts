/**
 * Shared record helpers.
 *
 * @module types/common
 */

import { z } from 'zod';
import { DeserializationError } from '../errors.js';

/**
 * Hypermedia link carried by every API record.
 */
export const LinkSchema = z.object({
  rel: z.string(),
  href: z.string(),
});

export type Link = z.infer<typeof LinkSchema>;

/**
 * Identifiers come back as numbers for jobs and deployments, strings elsewhere.
 */
export const UidSchema = z.union([z.number(), z.string()]).transform((uid) => String(uid));

/**
 * Wraps an item schema into the `{ items: [...] }` collection envelope.
 */
export function collectionOf<T extends z.ZodTypeAny>(item: T) {
  return z.object({ items: z.array(item) });
}

/**
 * Parses `data` with `schema`, raising a DeserializationError naming `what`.
 */
export function parseRecord<T extends z.ZodTypeAny>(schema: T, data: unknown, what: string): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at '${issue.path.join('.')}'` : '';
    throw new DeserializationError(
      `Unexpected ${what} format${where}: ${issue ? issue.message : 'invalid'}`,
      result.error
    );
  }
  return result.data;
}

/**
 * Returns the href of the link with relation `rel`.
 */
export function findLink(links: readonly Link[], rel: string): string | undefined {
  return links.find((link) => link.rel === rel)?.href;
}
