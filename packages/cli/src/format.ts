/**
 * Wharf CLI — Output formatting
 */

import { UNKNOWN_VALUE } from '@wharf/kernel'
import type { ChangeAction, ChangeSet, ResourceOperation } from '@wharf/kernel'
import { canonicalize } from '@wharf/stack-dsl'
import type { AttributeValue } from '@wharf/stack-dsl'
import { actionColor, actionSymbol, t } from './theme.js'

export function formatValue(value: AttributeValue | undefined): string {
  if (value === undefined) return '(none)'
  if (value === UNKNOWN_VALUE) return value
  return canonicalize(value)
}

function operationLines(op: ResourceOperation): string[] {
  const color = actionColor(op.action)
  const lines = [color(`  ${actionSymbol(op.action)} ${op.id}`) + t.muted(` (${op.kind})`)]
  if (op.action === 'delete') return lines
  for (const name of op.changed) {
    const after = formatValue(op.after?.[name])
    if (op.action === 'create') {
      lines.push(`      ${name} = ${after}`)
    } else {
      lines.push(`      ${name}: ${formatValue(op.before?.[name])} → ${after}`)
    }
  }
  return lines
}

export function countActions(changes: ChangeSet): Record<ChangeAction, number> {
  const counts: Record<ChangeAction, number> = { create: 0, update: 0, replace: 0, delete: 0 }
  for (const op of changes.operations) counts[op.action]++
  return counts
}

export function formatChangeSet(changes: ChangeSet): string[] {
  if (changes.operations.length === 0) {
    return [t.green('No changes. The deployed state matches the stack.')]
  }
  const lines = ['Wharf will perform the following actions:', '']
  for (const op of changes.operations) lines.push(...operationLines(op))
  const counts = countActions(changes)
  lines.push(
    '',
    t.white(
      `Plan: ${counts.create} to create, ${counts.update} to update, ` +
        `${counts.replace} to replace, ${counts.delete} to delete. ${changes.unchanged.length} unchanged.`,
    ),
  )
  return lines
}

export function formatOutputs(outputs: Readonly<Record<string, string>>): string[] {
  const names = Object.keys(outputs).sort()
  if (names.length === 0) return [t.muted('  (none)')]
  return names.map((name) => `  ${t.blue(name)} = ${outputs[name] ?? ''}`)
}
