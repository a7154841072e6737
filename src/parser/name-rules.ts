/**
 * symdoc - Symbol Name Rules
 *
 * Names containing any of these fragments belong to operator, overload or
 * scoped-member pages, which are left out of the database.
 *
 * @module parser/name-rules
 */

export interface NameRule {
  /** Substring that disqualifies a name */
  readonly fragment: string;
  /** What a name containing the fragment usually is */
  readonly kind: string;
}

export const NAME_RULES: readonly NameRule[] = [
  { fragment: '+', kind: 'arithmetic operator' },
  { fragment: '=', kind: 'assignment or comparison operator' },
  { fragment: '()', kind: 'call operator' },
  { fragment: '!', kind: 'negation operator' },
  { fragment: '::', kind: 'scoped member' },
];

/**
 * First rule `name` breaks, or undefined when the name is acceptable
 */
export function findNameViolation(
  name: string,
  rules: readonly NameRule[] = NAME_RULES
): NameRule | undefined {
  return rules.find((rule) => name.includes(rule.fragment));
}
