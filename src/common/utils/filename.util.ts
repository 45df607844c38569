export class FilenameUtil {
  private static readonly MAX_FILENAME_LENGTH = 255
  private static readonly CONTROL_CHARS = /[\x00-\x1f\x7f]/g

  /**
   * Reduces a client supplied name to something safe to show and to echo back in headers.
   * Directory components are dropped; the result is never used to build a path.
   */
  static toDisplayName(originalName: string | undefined): string {
    if (!originalName || typeof originalName !== 'string') return 'file'

    const lastSegment = originalName.split(/[/\\]/).pop() ?? ''
    const cleaned = lastSegment.replace(this.CONTROL_CHARS, '').trim()
    if (cleaned === '' || cleaned === '.' || cleaned === '..') return 'file'

    return cleaned.length > this.MAX_FILENAME_LENGTH
      ? cleaned.substring(0, this.MAX_FILENAME_LENGTH)
      : cleaned
  }

  static storageKey(transferId: string, fileId: string): string {
    return `${this.transferPrefix(transferId)}${fileId}`
  }

  static transferPrefix(transferId: string): string {
    return `transfers/${transferId}/`
  }

  /** Extracts the transfer id from a key produced by `storageKey`. */
  static transferIdFromKey(key: string): string | null {
    const match = /^transfers\/([^/]+)\/[^/]+$/.exec(key)
    return match ? match[1] : null
  }

  static contentDisposition(name: string): string {
    const asciiName = name.replace(/[^\x20-\x7e]/g, '_').replace(/["\\]/g, '_')
    const encoded = encodeURIComponent(name)
    return `attachment; filename="${asciiName}"; filename*=UTF-8''${encoded}`
  }
}
