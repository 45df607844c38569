export class ValidationUtil {
  private static readonly MAX_ID_LENGTH = 64
  private static readonly MAX_CONTACT_LENGTH = 120
  private static readonly MAX_RECIPIENTS = 50

  static validateTransferId(id: string): { isValid: boolean; errors: string[] } {
    const errors: string[] = []

    if (!id || typeof id !== 'string') {
      errors.push('Transfer ID is required and must be a string')
    } else if (id.trim().length === 0) {
      errors.push('Transfer ID cannot be empty')
    } else if (id.length > this.MAX_ID_LENGTH) {
      errors.push('Transfer ID is too long')
    } else if (!/^[a-zA-Z0-9_-]+$/.test(id)) {
      errors.push('Transfer ID must contain only alphanumeric characters, hyphens, and underscores')
    }

    return { isValid: errors.length === 0, errors }
  }

  static normalizeContact(value: string | undefined): string | undefined {
    if (typeof value !== 'string') return undefined
    const trimmed = value.trim()
    if (trimmed === '') return undefined
    return trimmed.substring(0, this.MAX_CONTACT_LENGTH)
  }

  /** Accepts a comma or semicolon separated list. */
  static parseRecipientList(value: string | undefined): string[] {
    if (typeof value !== 'string') return []
    return value
      .split(/[,;]/)
      .map((v) => this.normalizeContact(v))
      .filter((v): v is string => v !== undefined)
      .slice(0, this.MAX_RECIPIENTS)
  }
}
