/**
 * Filter/sort transform over income-statement records.
 *
 * Pure: returns a new array, reads record fields without touching them.
 * Fields are read lazily, so a record missing `revenue` only fails when a
 * revenue bound or revenue sort actually needs it.
 */

import { MissingFieldError } from '../core/errors.js'
import type { FinancialRecord } from '../fmp/types/income-statement.js'
import { isSortField, type FilterCriteria, type SortField, type SortKey } from './types.js'

interface Indexed {
  record: FinancialRecord
  index: number
}

// ==================== Field access ====================

const YEAR_PREFIX = /^(\d{4})/

/**
 * Comparable numeric value of a record field.
 * `date` may be an integer year or an ISO date string; strings compare by their leading year.
 */
function readField({ record, index }: Indexed, field: SortField): number {
  const value = record[field]

  if (typeof value === 'number' && Number.isFinite(value)) return value

  if (field === 'date' && typeof value === 'string') {
    const match = YEAR_PREFIX.exec(value)
    if (match) return Number(match[1])
  }

  throw new MissingFieldError(field, index)
}

// ==================== Filter ====================

/**
 * A bound of 0 is treated as "not provided". Callers cannot filter on an
 * exact zero boundary; `minNetIncome=0` does not drop loss-making years.
 */
function isEnforced(bound: number | undefined): bound is number {
  return bound !== undefined && bound !== 0
}

function matches(item: Indexed, criteria: FilterCriteria): boolean {
  const { startDate, endDate, minRevenue, maxRevenue, minNetIncome, maxNetIncome } = criteria

  if (isEnforced(startDate) && readField(item, 'date') < startDate) return false
  if (isEnforced(endDate) && readField(item, 'date') > endDate) return false
  if (isEnforced(minRevenue) && readField(item, 'revenue') < minRevenue) return false
  if (isEnforced(maxRevenue) && readField(item, 'revenue') > maxRevenue) return false
  if (isEnforced(minNetIncome) && readField(item, 'netIncome') < minNetIncome) return false
  if (isEnforced(maxNetIncome) && readField(item, 'netIncome') > maxNetIncome) return false
  return true
}

// ==================== Public ====================

/**
 * Keep records satisfying every enforced bound, then order them descending by
 * `sortKey` when it names a sortable field. Ties keep upstream order.
 *
 * @throws MissingFieldError when a needed field is absent or not numeric.
 */
export function applyCriteria(
  records: readonly FinancialRecord[],
  criteria: FilterCriteria,
  sortKey: SortKey,
): FinancialRecord[] {
  const kept = records
    .map((record, index): Indexed => ({ record, index }))
    .filter((item) => matches(item, criteria))

  if (isSortField(sortKey)) {
    const field = sortKey
    // Array.prototype.sort is stable since ES2019
    kept.sort((a, b) => readField(b, field) - readField(a, field))
  }

  return kept.map((item) => item.record)
}
