export const defaultDisplayFormat = {
  currency: 'USD',
  locale: 'en-US',
}

export type DisplayFormat = typeof defaultDisplayFormat

const buildCurrencyFormatter = (format: DisplayFormat) => {
  try {
    return new Intl.NumberFormat(format.locale, {
      style: 'currency',
      currency: format.currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    })
  } catch {
    return new Intl.NumberFormat(defaultDisplayFormat.locale, {
      style: 'currency',
      currency: defaultDisplayFormat.currency,
      minimumFractionDigits: 2,
      maximumFractionDigits: 2,
    })
  }
}

export const createMoneyFormatter = (format: DisplayFormat) => {
  const formatter = buildCurrencyFormatter(format)
  return (value: number) => formatter.format(Number.isFinite(value) ? value : 0)
}

export const currencySymbol = (format: DisplayFormat) =>
  buildCurrencyFormatter(format)
    .formatToParts(0)
    .find((part) => part.type === 'currency')?.value ?? format.currency
