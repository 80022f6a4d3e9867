import { z } from 'zod';
import platformEntries from './platforms.json';

const platformEntrySchema = z.object({
  key: z.string().regex(/^[A-Z0-9_]+$/),
  code: z.string().min(1),
  description: z.string()
});

export type PlatformEntry = z.infer<typeof platformEntrySchema>;

export const PLATFORM_ENTRIES: readonly PlatformEntry[] = Object.freeze(
  z.array(platformEntrySchema).parse(platformEntries)
);

export type PlatformCodes = Readonly<Record<string, string>>;

/**
 * Enum-like map from member name to platform code, e.g. `SNES → 'SNES'`,
 * `_3DS → '3DS'`. Frozen so a plugin cannot grow the known set.
 */
export function createPlatformEnum(): PlatformCodes {
  const codes: Record<string, string> = {};
  for (const entry of PLATFORM_ENTRIES) {
    codes[entry.key] = entry.code;
  }
  return Object.freeze(codes);
}

export function describePlatform(code: string): string | null {
  return PLATFORM_ENTRIES.find((entry) => entry.code === code)?.description ?? null;
}
