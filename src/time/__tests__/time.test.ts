import { describe, expect, it } from 'vitest'
import {
  addDays,
  civilDayWindow,
  createTimeWindow,
  formatLocal,
  formatOffset,
  localDateOf,
  parseLocalDate,
  parseLocalDateTime,
  windowAround,
} from '../index.js'
import { InvalidInputError, InvalidWindowError } from '../../errors/index.js'

describe('windows', () => {
  it('spans local midnight to local midnight', () => {
    const w = civilDayWindow(new Date('2024-03-20T00:00:00Z'), 5.5)
    expect(w.start.toISOString()).toBe('2024-03-19T18:30:00.000Z')
    expect(w.end.toISOString()).toBe('2024-03-20T18:30:00.000Z')
  })

  it('rejects a window whose start is not before its end', () => {
    const a = new Date('2024-03-20T01:00:00Z')
    const b = new Date('2024-03-20T00:00:00Z')
    expect(() => createTimeWindow(a, b)).toThrow(InvalidWindowError)
    expect(() => createTimeWindow(a, b)).toThrow(
      'Invalid time window: start 2024-03-20T01:00:00.000Z is not before end 2024-03-20T00:00:00.000Z',
    )
    expect(() => createTimeWindow(a, a)).toThrow(InvalidWindowError)
  })

  it('centres a window on an instant', () => {
    const w = windowAround(new Date('2024-03-20T12:00:00Z'), 2)
    expect(w.start.toISOString()).toBe('2024-03-20T10:00:00.000Z')
    expect(w.end.toISOString()).toBe('2024-03-20T14:00:00.000Z')
  })
})

describe('civil dates', () => {
  it('reads the observer date at an instant', () => {
    expect(localDateOf(new Date('2024-03-19T20:00:00Z'), 5.5).toISOString()).toBe('2024-03-20T00:00:00.000Z')
    expect(localDateOf(new Date('2024-03-20T02:00:00Z'), -5).toISOString()).toBe('2024-03-19T00:00:00.000Z')
  })

  it('moves by whole days', () => {
    expect(addDays(new Date('2024-02-28T00:00:00Z'), 2).toISOString()).toBe('2024-03-01T00:00:00.000Z')
  })

  it('parses dates and rejects impossible ones', () => {
    expect(parseLocalDate('2024-02-29').toISOString()).toBe('2024-02-29T00:00:00.000Z')
    expect(() => parseLocalDate('2024-02-30')).toThrow(InvalidInputError)
    expect(() => parseLocalDate('20-03-2024')).toThrow('Invalid date: 20-03-2024. Use YYYY-MM-DD format.')
  })

  it('parses a wall-clock reading into UTC', () => {
    expect(parseLocalDateTime('2024-03-20T06:30', 5.5).toISOString()).toBe('2024-03-20T01:00:00.000Z')
    expect(parseLocalDateTime('2024-03-20 06:30:15', 0).toISOString()).toBe('2024-03-20T06:30:15.000Z')
    expect(() => parseLocalDateTime('2024-03-20T25:00', 0)).toThrow(InvalidInputError)
  })
})

describe('formatting', () => {
  it('formats on the observer clock, rounded to the second', () => {
    expect(formatLocal(new Date('2024-03-20T01:00:00.400Z'), 5.5)).toBe('2024-03-20 06:30:00')
    expect(formatLocal(new Date('2024-03-20T01:00:00.600Z'), 5.5)).toBe('2024-03-20 06:30:01')
  })

  it('formats offsets', () => {
    expect(formatOffset(5.5)).toBe('+05:30')
    expect(formatOffset(-3.5)).toBe('-03:30')
    expect(formatOffset(77 / 15)).toBe('+05:08')
  })
})
