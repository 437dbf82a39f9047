/**
 * Stylesheet fragment types.
 */

export type FragmentKind = 'inline' | 'file';

/**
 * One unit of stylesheet source.
 * For `file` fragments the payload is a path; for `inline` it is literal source text.
 */
export interface Fragment {
  readonly kind: FragmentKind;
  readonly payload: string;
}

/**
 * Fragments keyed by caller-defined identifier. Insertion order is the aggregation order.
 */
export type FragmentSet = ReadonlyMap<string, Fragment>;

/**
 * Outcome of checking that every file fragment exists.
 */
export interface FragmentValidation {
  /** Identifiers of fragments that may be compiled */
  valid: string[];
  /** File fragments whose source is missing */
  missing: MissingFragment[];
}

export interface MissingFragment {
  id: string;
  /** Path as resolved against the base directory */
  path: string;
}

export function inlineFragment(source: string): Fragment {
  return { kind: 'inline', payload: source };
}

export function fileFragment(filePath: string): Fragment {
  return { kind: 'file', payload: filePath };
}
