import { describe, it, expect } from 'vitest'
import { AmountFormat } from '../../../src/core/domain/amount.js'
import {
  amount,
  amountQuantityThenSymbol,
  amountSymbolThenQuantity,
  normalizeQuantity,
  quantity,
  quotedSymbol,
  symbol,
  unquotedSymbol
} from '../../../src/core/parser/amount.js'
import { parseAll, parseAmount, runParser } from '../../../src/core/parser/run.js'
import { expectFailure } from '../../../src/testing/expect-failure.js'

const dollar = { value: '$', quoted: false }

describe('quantity', () => {
  it('should parse a negative quantity without fractional part', () => {
    expect(parseAll(quantity, '-1110')).toBe('-1110')
  })

  it('should strip grouping separators', () => {
    expect(parseAll(quantity, '2,314')).toBe('2314')
  })

  it('should keep sign and decimal point', () => {
    expect(parseAll(quantity, '-1,110.38')).toBe('-1110.38')
  })

  it('should leave a quantity without separators unchanged', () => {
    expect(parseAll(quantity, '24521.793')).toBe('24521.793')
  })

  it('should keep trailing zeros', () => {
    expect(parseAll(quantity, '13,245.00')).toBe('13245.00')
  })

  it('should accept more than one decimal point as written', () => {
    expect(parseAll(quantity, '1.2.3')).toBe('1.2.3')
  })

  it('should stop at the first character that is not part of a number', () => {
    expect(runParser(quantity, '12AAPL')).toEqual({ ok: true, value: '12', rest: 'AAPL' })
  })

  it('should require a digit after the sign', () => {
    const error = expectFailure(runParser(quantity, '-'))
    expect(error.offset).toBe(1)
    expect(error.expected).toEqual(['digit'])
  })

  it('should require a leading digit', () => {
    const error = expectFailure(runParser(quantity, '.5'))
    expect(error.offset).toBe(0)
    expect(error.expected).toEqual(["'-'", 'digit'])
  })

  it('should normalize idempotently', () => {
    for (const text of ['-1,110.38', '2,314', '24521.793', '1,2,3.4,5']) {
      const once = normalizeQuantity(text)
      expect(normalizeQuantity(once)).toBe(once)
    }
    expect(normalizeQuantity('1,2,3.4,5')).toBe('123.45')
  })
})

describe('symbols', () => {
  it('should parse a quoted symbol', () => {
    expect(parseAll(quotedSymbol, '"MUTF2351"')).toEqual({ value: 'MUTF2351', quoted: true })
  })

  it('should allow spaces inside quotes', () => {
    expect(parseAll(quotedSymbol, '"S&P 500"')).toEqual({ value: 'S&P 500', quoted: true })
  })

  it('should parse an unquoted currency sign', () => {
    expect(parseAll(unquotedSymbol, '$')).toEqual(dollar)
  })

  it('should parse an unquoted symbol of letters and signs', () => {
    expect(parseAll(unquotedSymbol, 'US$')).toEqual({ value: 'US$', quoted: false })
  })

  it('should parse an unquoted ticker', () => {
    expect(parseAll(unquotedSymbol, 'AAPL')).toEqual({ value: 'AAPL', quoted: false })
  })

  it('should end an unquoted symbol at a digit', () => {
    expect(runParser(unquotedSymbol, 'USD5')).toEqual({
      ok: true,
      value: { value: 'USD', quoted: false },
      rest: '5'
    })
  })

  it('should try the quoted form first', () => {
    expect(parseAll(symbol, '"MUTF2351"')).toEqual({ value: 'MUTF2351', quoted: true })
    expect(parseAll(symbol, '$')).toEqual(dollar)
  })

  it('should reject empty quotes inside the quotes', () => {
    const error = expectFailure(runParser(symbol, '""'))
    expect(error.column).toBe(2)
    expect(error.expected).toEqual(['symbol character'])
  })

  it('should reject a symbol starting with a digit', () => {
    const error = expectFailure(runParser(symbol, '5'))
    expect(error.message).toBe("Expected symbol but found '5' at line 1, column 1")
  })
})

describe('amount', () => {
  it('should parse symbol then quantity without whitespace', () => {
    expect(parseAll(amountSymbolThenQuantity, '$13,245.00')).toEqual({
      value: '13245.00',
      symbol: dollar,
      format: AmountFormat.SymbolLeftNoSpace
    })
  })

  it('should parse symbol then quantity with whitespace', () => {
    expect(parseAll(amountSymbolThenQuantity, '$ 13,245.00')).toEqual({
      value: '13245.00',
      symbol: dollar,
      format: AmountFormat.SymbolLeftWithSpace
    })
  })

  it('should parse quantity then symbol without whitespace', () => {
    expect(parseAll(amountQuantityThenSymbol, '13,245.463AAPL')).toEqual({
      value: '13245.463',
      symbol: { value: 'AAPL', quoted: false },
      format: AmountFormat.SymbolRightNoSpace
    })
  })

  it('should parse quantity then symbol with whitespace', () => {
    expect(parseAll(amountQuantityThenSymbol, '13,245.463 "MUTF2351"')).toEqual({
      value: '13245.463',
      symbol: { value: 'MUTF2351', quoted: true },
      format: AmountFormat.SymbolRightWithSpace
    })
  })

  it('should detect each of the four formats', () => {
    expect(parseAmount('$13,245.00').format).toBe(AmountFormat.SymbolLeftNoSpace)
    expect(parseAmount('$ 13,245.00').format).toBe(AmountFormat.SymbolLeftWithSpace)
    expect(parseAmount('13,245.463AAPL').format).toBe(AmountFormat.SymbolRightNoSpace)
    expect(parseAmount('13,245.463 "MUTF2351"').format).toBe(AmountFormat.SymbolRightWithSpace)
  })

  it('should parse symbol first', () => {
    expect(parseAmount('$13,245.46')).toEqual({
      value: '13245.46',
      symbol: dollar,
      format: AmountFormat.SymbolLeftNoSpace
    })
  })

  it('should fall back to quantity first', () => {
    expect(parseAmount('13,245.463 "MUTF2351"')).toEqual({
      value: '13245.463',
      symbol: { value: 'MUTF2351', quoted: true },
      format: AmountFormat.SymbolRightWithSpace
    })
  })

  it('should read a negative quantity after the symbol', () => {
    expect(parseAmount('$-5')).toEqual({
      value: '-5',
      symbol: dollar,
      format: AmountFormat.SymbolLeftNoSpace
    })
  })

  it('should read a negative quantity before the symbol', () => {
    expect(parseAmount('-5 EUR')).toEqual({
      value: '-5',
      symbol: { value: 'EUR', quoted: false },
      format: AmountFormat.SymbolRightWithSpace
    })
  })

  it('should treat a tab as separating whitespace', () => {
    expect(parseAmount('$\t5').format).toBe(AmountFormat.SymbolLeftWithSpace)
  })

  it('should report a failure inside the quantity, not at the start of the amount', () => {
    const error = expectFailure(runParser(amount, '$-x'))
    expect(error.offset).toBe(2)
    expect(error.message).toBe("Expected digit but found 'x' at line 1, column 3")
  })

  it('should report every expectation at the point of failure', () => {
    const error = expectFailure(runParser(amount, '$ '))
    expect(error.message).toBe(
      "Expected whitespace, '-' or digit but found end of input at line 1, column 3"
    )
  })

  it('should merge expectations of both orderings when neither applies', () => {
    const error = expectFailure(runParser(amount, ';'))
    expect(error.offset).toBe(0)
    expect(error.expected).toEqual(['symbol', "'-'", 'digit'])
  })

  it('should leave trailing input for the caller', () => {
    expect(runParser(amount, '$5.42 ; note')).toEqual({
      ok: true,
      value: { value: '5.42', symbol: dollar, format: AmountFormat.SymbolLeftNoSpace },
      rest: ' ; note'
    })
  })
})
