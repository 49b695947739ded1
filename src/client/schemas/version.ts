/**
 * version.ts — Zod schema for the document served at `GET api/X.Y/version/`.
 *
 * Example:
 *   { "version": "2.4.2", "subversion": "",
 *     "capabilities": ["networks-management", "static-ipaddresses"] }
 *
 * Some servers spell the list key `Capabilities`; it is accepted as an alias.
 */

import { z } from 'zod';

const VersionDocumentSchema = z.object({
  version: z.string().optional(),
  subversion: z.string().optional(),
  capabilities: z.array(z.string()),
});

export const VersionInfoSchema = z.preprocess((raw) => {
  if (typeof raw === 'object' && raw !== null && !('capabilities' in raw) && 'Capabilities' in raw) {
    return { ...raw, capabilities: raw.Capabilities };
  }
  return raw;
}, VersionDocumentSchema);

export type VersionInfo = z.infer<typeof VersionInfoSchema>;
