/** Inclusive bounds; `undefined` means the caller did not supply the parameter. */
export interface FilterCriteria {
  startDate?: number
  endDate?: number
  minRevenue?: number
  maxRevenue?: number
  minNetIncome?: number
  maxNetIncome?: number
}

export const SORT_FIELDS = ['date', 'revenue', 'netIncome'] as const

export type SortField = (typeof SORT_FIELDS)[number]

/**
 * Any string is accepted. Only the three SortField values reorder the result;
 * everything else keeps the filtered order.
 */
export type SortKey = SortField | (string & {})

export const DEFAULT_SORT_KEY: SortField = 'date'

export function isSortField(key: string): key is SortField {
  return (SORT_FIELDS as readonly string[]).includes(key)
}
