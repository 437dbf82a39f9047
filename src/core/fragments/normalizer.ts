/**
 * Fragment Normalizer - turns an ordered fragment set into one compiler-ready source blob.
 *
 * Inline fragments are emitted verbatim, file fragments become `@import` directives so the
 * backend resolves nested imports itself. Comment stripping is regex based: comment-like
 * sequences inside string literals are not protected.
 */
import { fileExists, resolvePath } from '../../utils/file-system.js';
import type { Fragment, FragmentSet, FragmentValidation, MissingFragment } from './types.js';

const BLOCK_COMMENT = /\/\*[\s\S]*?\*\//g;
// `//` only counts as a comment at line start or after whitespace, `;`, `{` or `}`, so `url(//cdn/x)` survives.
const LINE_COMMENT = /(^|[ \t;{}])\/\/.*$/gm;
const BLANK_LINE_RUN = /\n(?:[ \t]*\n)+/g;

/**
 * Resolve a file fragment's path against the base directory.
 */
export function resolveFragmentPath(fragment: Fragment, baseDir: string): string {
  return resolvePath(baseDir, fragment.payload);
}

/**
 * Check that every file fragment exists. Inline fragments are always valid.
 */
export async function validateFragments(
  fragments: FragmentSet,
  baseDir: string
): Promise<FragmentValidation> {
  const entries = [...fragments.entries()];

  const checks = await Promise.all(
    entries.map(async ([id, fragment]) => {
      if (fragment.kind === 'inline') return { id, missing: null };
      const path = resolveFragmentPath(fragment, baseDir);
      return { id, missing: (await fileExists(path)) ? null : { id, path } };
    })
  );

  const valid: string[] = [];
  const missing: MissingFragment[] = [];
  for (const check of checks) {
    if (check.missing) {
      missing.push(check.missing);
    } else {
      valid.push(check.id);
    }
  }

  return { valid, missing };
}

/**
 * Expand a single fragment into source text.
 */
export function expandFragment(fragment: Fragment, baseDir: string): string {
  if (fragment.kind === 'inline') {
    return fragment.payload;
  }
  const importPath = resolveFragmentPath(fragment, baseDir)
    .replace(/\\/g, '/')
    .replace(/"/g, '\\"');
  return `@import "${importPath}";`;
}

/**
 * Remove block comments and line comments.
 */
export function stripComments(source: string): string {
  return source.replace(BLOCK_COMMENT, '').replace(LINE_COMMENT, '$1');
}

/**
 * Collapse runs of blank (or whitespace-only) lines into a single newline.
 */
export function collapseBlankLines(source: string): string {
  return source.replace(BLANK_LINE_RUN, '\n');
}

/**
 * Expand, concatenate (in input order), strip comments and collapse blank lines.
 */
export function normalize(fragments: FragmentSet, baseDir: string): string {
  const joined = [...fragments.values()]
    .map((fragment) => expandFragment(fragment, baseDir))
    .join('\n')
    .replace(/\r\n?/g, '\n');

  return collapseBlankLines(stripComments(joined));
}
