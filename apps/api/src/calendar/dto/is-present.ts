/**
 * `@ValidateIf` predicate for fields that may be omitted but not nulled.
 * Unlike `@IsOptional()`, an explicit `null` is still validated.
 */
export function isPresent(_dto: object, value: unknown): boolean {
  return value !== undefined;
}
