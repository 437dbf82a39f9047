/**
 * Fragment manifests: YAML files describing one compilation request for the CLI.
 *
 * ```yaml
 * theme: bartik
 * fragments:
 *   - id: base
 *     file: styles/base.scss
 *   - id: overrides
 *     inline: "$accent: teal;"
 * ```
 *
 * Fragments are a list rather than a mapping so numeric-looking ids keep their order.
 */
import { z } from 'zod';
import { loadYamlWithSchema } from '../../utils/yaml.js';
import { RequestError, SonarError, ErrorCodes } from '../../utils/errors.js';
import { fileFragment, inlineFragment, type Fragment } from '../fragments/types.js';
import { createCompilationRequest, ThemeSchema, type CompilationRequest } from './request.js';

const FragmentIdSchema = z.union([z.string(), z.number()]).transform(String);

export const ManifestFragmentSchema = z.union([
  z.object({ id: FragmentIdSchema, file: z.string().min(1) }),
  z.object({ id: FragmentIdSchema, inline: z.string() }),
]);

export const ManifestSchema = z.object({
  theme: ThemeSchema,
  live_mode: z.boolean().optional(),
  fragments: z.array(ManifestFragmentSchema).min(1),
});

export type ManifestFragment = z.infer<typeof ManifestFragmentSchema>;
export type Manifest = z.infer<typeof ManifestSchema>;

function toFragment(entry: ManifestFragment): Fragment {
  return 'file' in entry ? fileFragment(entry.file) : inlineFragment(entry.inline);
}

/**
 * Load and validate a manifest file.
 */
export async function loadManifest(manifestPath: string): Promise<Manifest> {
  try {
    return await loadYamlWithSchema(manifestPath, ManifestSchema);
  } catch (error) {
    if (error instanceof SonarError) {
      throw new RequestError(ErrorCodes.INVALID_MANIFEST, error.message, error.details);
    }
    throw error;
  }
}

/**
 * Build a compilation request from a manifest.
 */
export function manifestToRequest(
  manifest: Manifest,
  now: () => number = Date.now
): CompilationRequest {
  return createCompilationRequest(
    {
      theme: manifest.theme,
      fragments: manifest.fragments.map((entry): [string, Fragment] => [entry.id, toFragment(entry)]),
      liveMode: manifest.live_mode,
    },
    now
  );
}
