/**
 * Income statement types: the subset of Financial Modeling Prep's
 * `/api/v3/income-statement` payload this service reads.
 *
 * Only `date`, `revenue` and `netIncome` are inspected. Everything else the
 * provider sends (symbol, reportedCurrency, grossProfit, eps, ...) rides along
 * through the index signature and is returned to the caller untouched.
 */

export interface FinancialRecord {
  /** Year as an integer, or FMP's ISO period-end date (`"2023-09-30"`). */
  date?: number | string
  revenue?: number
  netIncome?: number
  [key: string]: unknown
}

/** FMP reports some failures (bad key, plan limits) as a 200 with this body. */
export interface FmpErrorBody {
  'Error Message': string
}
