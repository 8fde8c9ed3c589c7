import { describe, it, expect } from 'vitest'
import { detectColumns, detectRawColumns, detectRows, separatorWidth } from '../terminal.js'

const noTty = { isTTY: false, columns: 200, rows: 80 }

describe('terminal size', () => {
  it('should prefer explicit sizes', () => {
    expect(detectColumns({ columns: 120, env: { COLUMNS: '80' }, stdout: noTty })).toBe(120)
    expect(detectRows({ rows: 30, env: { LINES: '50' }, stdout: noTty })).toBe(30)
  })

  it('should read COLUMNS and LINES', () => {
    expect(detectColumns({ env: { COLUMNS: '132' }, stdout: noTty })).toBe(132)
    expect(detectRows({ env: { LINES: '50' }, stdout: noTty })).toBe(50)
  })

  it('should only trust the stdout size of a TTY', () => {
    expect(detectColumns({ env: {}, stdout: { isTTY: true, columns: 90 } })).toBe(90)
    expect(detectColumns({ env: {}, stdout: noTty })).toBe(100)
    expect(detectRows({ env: {}, stdout: noTty })).toBe(40)
  })

  it('should widen narrow terminals to 60 columns', () => {
    expect(detectColumns({ columns: 40, env: {}, stdout: noTty })).toBe(60)
  })

  it('should fall back to 100 columns for unusable widths', () => {
    expect(detectColumns({ columns: 15, env: {}, stdout: noTty })).toBe(100)
    expect(detectColumns({ env: { COLUMNS: 'wide' }, stdout: noTty })).toBe(100)
    expect(detectRawColumns({ env: { COLUMNS: '0' }, stdout: noTty })).toBeUndefined()
  })

  it('should size the separator from the raw width', () => {
    expect(separatorWidth({ env: {}, stdout: noTty })).toBe(100)
    expect(separatorWidth({ columns: 10, env: {}, stdout: noTty })).toBe(20)
    expect(separatorWidth({ columns: 72, env: {}, stdout: noTty })).toBe(72)
  })
})
