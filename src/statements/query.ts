/**
 * Query-string → FilterCriteria/SortKey.
 *
 * Missing and empty parameters are absent. A value that is present but does
 * not parse is a client error, never a silent "ignore".
 */

import { z } from 'zod'
import { MalformedQueryError } from '../core/errors.js'
import { DEFAULT_SORT_KEY, type FilterCriteria, type SortKey } from './types.js'

const integerParam = z.string().regex(/^[+-]?\d+$/).transform(Number)

// Plain decimals with an optional exponent ("1.5e3"); no hex, binary or Infinity
const numberParam = z
  .string()
  .regex(/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/)
  .transform(Number)
  .pipe(z.number().finite())

interface BoundParam {
  name: keyof FilterCriteria
  schema: z.ZodType<number, z.ZodTypeDef, string>
  expected: 'an integer' | 'a number'
}

const BOUND_PARAMS: readonly BoundParam[] = [
  { name: 'startDate', schema: integerParam, expected: 'an integer' },
  { name: 'endDate', schema: integerParam, expected: 'an integer' },
  { name: 'minRevenue', schema: numberParam, expected: 'a number' },
  { name: 'maxRevenue', schema: numberParam, expected: 'a number' },
  { name: 'minNetIncome', schema: numberParam, expected: 'a number' },
  { name: 'maxNetIncome', schema: numberParam, expected: 'a number' },
]

export type RawQuery = Record<string, string | undefined>

export interface ParsedQuery {
  criteria: FilterCriteria
  sortKey: SortKey
}

/** @throws MalformedQueryError on the first parameter that fails to parse. */
export function parseQuery(query: RawQuery): ParsedQuery {
  const criteria: FilterCriteria = {}

  for (const { name, schema, expected } of BOUND_PARAMS) {
    const raw = query[name]
    if (raw === undefined) continue

    const value = raw.trim()
    if (value === '') continue

    const parsed = schema.safeParse(value)
    if (!parsed.success) {
      throw new MalformedQueryError(name, raw, expected)
    }
    criteria[name] = parsed.data
  }

  // Only absence falls back to the default; `sortBy=` means "no reordering"
  const sortKey = query.sortBy ?? DEFAULT_SORT_KEY

  return { criteria, sortKey }
}
