/**
 * Wharf Kernel — Capability Claims
 *
 * A capability claim names a permission the signed module asks its host for,
 * e.g. `awslambda:event` or `wascc:logging`. The claim set embedded in an
 * artifact is deduplicated and sorted so that the same set always signs to
 * the same bytes.
 */

export interface CapabilityClaim {
  readonly name: string;
}

/** `namespace:id`, lowercase letters, digits, `_`, `-` and `.` on both sides. */
export const CAPABILITY_NAME_PATTERN = /^[a-z0-9_.\-]+:[a-z0-9_.\-]+$/;

export type CapabilitySetResult =
  | { readonly ok: true; readonly claims: ReadonlyArray<CapabilityClaim> }
  | { readonly ok: false; readonly invalid: ReadonlyArray<string> };

/**
 * Validate and normalize a list of capability names.
 *
 * Returns every invalid name when any is malformed; otherwise the
 * deduplicated claims in ascending name order.
 */
export function normalizeCapabilities(names: ReadonlyArray<string>): CapabilitySetResult {
  const invalid = names.filter((n) => !CAPABILITY_NAME_PATTERN.test(n));
  if (invalid.length > 0) {
    return { ok: false, invalid };
  }
  const unique = [...new Set(names)].sort();
  return { ok: true, claims: unique.map((name) => ({ name })) };
}
