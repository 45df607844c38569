/**
 * Date utility with UTC support
 */
import dayjs from 'dayjs'
import utc from 'dayjs/plugin/utc.js'

dayjs.extend(utc)

export class DateUtil {
  static now(): dayjs.Dayjs {
    return dayjs().utc()
  }

  static addMilliseconds(date: Date, amount: number): Date {
    return dayjs(date).utc().add(amount, 'millisecond').toDate()
  }

  static addMinutes(date: Date, amount: number): Date {
    return dayjs(date).utc().add(amount, 'minute').toDate()
  }

  /** True once `now` is strictly past `expiresAt`. */
  static isExpired(expiresAt: Date | string, now: Date = new Date()): boolean {
    return dayjs(now).utc().isAfter(dayjs(expiresAt).utc())
  }

  static isBefore(date1: Date | string, date2: Date | string): boolean {
    return dayjs(date1).utc().isBefore(dayjs(date2).utc())
  }

  static toTimestamp(date: Date | string): number {
    return dayjs(date).utc().valueOf()
  }

  static fromTimestamp(timestamp: number): Date {
    return dayjs(timestamp).utc().toDate()
  }

  static toISOString(date: Date | string): string {
    return dayjs(date).utc().toISOString()
  }

  static parse(value: string): Date {
    const d = dayjs(value).utc()
    return d.isValid() ? d.toDate() : new Date(0)
  }
}
