/**
 * Colon-separated account name split into segments, root first:
 * `Expenses:Food:Groceries` is `['Expenses', 'Food', 'Groceries']`.
 */
export type AccountPath = readonly string[]
