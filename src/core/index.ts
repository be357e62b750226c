// Domain
export { type AccountPath } from './domain/account.js'
export { AmountFormat, type Amount, amountToDecimal, sameAmount } from './domain/amount.js'
export { type CommoditySymbol, sameSymbol } from './domain/commodity.js'
export { type LedgerDate, checkCalendarDate, compareDates, daysInMonth, formatDate } from './domain/date.js'
export { TransactionStatus, type Header } from './domain/header.js'
export { type Price, type PriceDatabase } from './domain/price.js'

// Ports
export { type PriceRepository, type PriceFilter } from './ports/price-repository.js'

// Grammar
export * from './parser/index.js'

// Errors
export { ParseError } from './errors/parse-error.js'
export { ValidationError } from './errors/validation-error.js'

// Utils
export { Decimal, isDecimalText } from './utils/decimal.js'
