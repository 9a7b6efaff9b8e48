/**
 * Plugin Manifest
 *
 * Zod schema for `plugin.json`, the file that marks a directory as a
 * dynamic plugin.
 *
 * Fields:
 *   name    - Namespaced plugin name (`Namespace::Name`); must match what
 *             the plugin reports from configure()
 *   entry   - Module exporting the plugin, relative to the plugin directory
 *   scripts - Input files queued for loading when the plugin is activated
 */

import { z } from 'zod';

export const MANIFEST_FILE = 'plugin.json';

const PLUGIN_NAME_RE = /^[A-Za-z_][A-Za-z0-9_-]*::[A-Za-z_][A-Za-z0-9_-]*$/;

export const PluginManifestSchema = z.object({
  name: z.string().regex(PLUGIN_NAME_RE, {
    message: 'name must be namespaced, e.g. Demo::Foo',
  }),

  entry: z.string().min(1),

  scripts: z.array(z.string().min(1)).default([]),
});

export type PluginManifest = z.infer<typeof PluginManifestSchema>;

/**
 * Render validation issues as `field: message; field: message`.
 */
export function formatManifestError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Parse and validate a raw manifest object. Throws a ZodError on failure.
 */
export function parseManifest(raw: unknown): PluginManifest {
  return PluginManifestSchema.parse(raw);
}

export function safeParseManifest(
  raw: unknown
): { success: true; data: PluginManifest } | { success: false; error: string } {
  const result = PluginManifestSchema.safeParse(raw);
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: formatManifestError(result.error) };
}
