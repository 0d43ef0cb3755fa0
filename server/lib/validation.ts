import { isValidIsoDate } from '../billMath'

export class ValidationError extends Error {
  override name = 'ValidationError'
}

export const validateNonNegative = (value: number, fieldName: string) => {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${fieldName} cannot be negative.`)
  }
}

export const validateDayOfMonth = (value: number, fieldName: string) => {
  if (!Number.isInteger(value) || value < 1 || value > 31) {
    throw new ValidationError(`${fieldName} must be an integer between 1 and 31.`)
  }
}

export const validatePositiveInteger = (value: number, fieldName: string, maxValue = 360) => {
  if (!Number.isInteger(value) || value < 1 || value > maxValue) {
    throw new ValidationError(`${fieldName} must be an integer between 1 and ${maxValue}.`)
  }
}

export const validateRequiredText = (value: string, fieldName: string) => {
  const trimmed = value.trim()
  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} is required.`)
  }

  if (trimmed.length > 140) {
    throw new ValidationError(`${fieldName} must be 140 characters or less.`)
  }
}

export const validateOptionalText = (value: string | undefined | null, fieldName: string, maxLength: number) => {
  if (value === undefined || value === null) {
    return
  }
  const trimmed = value.trim()
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${fieldName} must be ${maxLength} characters or less.`)
  }
}

export const validateIsoDate = (value: string, fieldName: string) => {
  if (!isValidIsoDate(value)) {
    throw new ValidationError(`${fieldName} must use YYYY-MM-DD format.`)
  }
}

export const validateHexColor = (value: string, fieldName: string) => {
  if (!/^#[0-9a-fA-F]{6}$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a hex color like #4f46e5.`)
  }
}
