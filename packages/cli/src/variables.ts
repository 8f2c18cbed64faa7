/**
 * Wharf CLI — `--var name=value` assignments
 *
 * A value takes the type of the variable's default: numbers and booleans
 * are converted, everything else stays a string. Assignments override the
 * config file's `variables`.
 */

import { ConfigError } from '@wharf/kernel'
import type { AttributeValue, StackDefinition } from '@wharf/stack-dsl'

function convert(name: string, raw: string, like: AttributeValue | undefined): AttributeValue {
  if (typeof like === 'number') {
    const value = Number(raw)
    if (raw.trim() === '' || Number.isNaN(value)) {
      throw new ConfigError('InvalidConfig', `Variable '${name}' expects a number, got '${raw}'`)
    }
    return value
  }
  if (typeof like === 'boolean') {
    if (raw !== 'true' && raw !== 'false') {
      throw new ConfigError('InvalidConfig', `Variable '${name}' expects true or false, got '${raw}'`)
    }
    return raw === 'true'
  }
  return raw
}

export function collectAssignment(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/** @throws {ConfigError} InvalidConfig for a malformed assignment or value */
export function parseAssignments(
  assignments: ReadonlyArray<string>,
  definition: StackDefinition,
): Record<string, AttributeValue> {
  const values: Record<string, AttributeValue> = {}
  for (const assignment of assignments) {
    const eq = assignment.indexOf('=')
    if (eq <= 0) {
      throw new ConfigError('InvalidConfig', `Invalid --var '${assignment}' (expected name=value)`)
    }
    const name = assignment.slice(0, eq)
    values[name] = convert(name, assignment.slice(eq + 1), definition.variables[name]?.default)
  }
  return values
}

export function stackVariables(
  configured: Readonly<Record<string, AttributeValue>>,
  assignments: ReadonlyArray<string>,
  definition: StackDefinition,
): Record<string, AttributeValue> {
  return { ...configured, ...parseAssignments(assignments, definition) }
}
