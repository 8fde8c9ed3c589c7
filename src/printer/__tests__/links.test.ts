import { describe, it, expect } from 'vitest'
import { expandEditorCmd, formatEditorLink, lineLinkFormatter, resolveEditorCmd } from '../links.js'

const IDEA = 'idea://open?file={file}&line={line}'

describe('resolveEditorCmd', () => {
  it('should use the configured template', () => {
    expect(resolveEditorCmd({ tty: false, editorCmd: ` ${IDEA} ` })).toBe(IDEA)
  })

  it('should default to VS Code links for TTY output only', () => {
    expect(resolveEditorCmd({ tty: true })).toBe('vscode://file/{file}:{line}')
    expect(resolveEditorCmd({ tty: false })).toBeUndefined()
    expect(resolveEditorCmd({ tty: false, editorCmd: '   ' })).toBeUndefined()
  })
})

describe('expandEditorCmd', () => {
  it('should substitute every placeholder', () => {
    expect(expandEditorCmd('x {path} {file} {line}', '/a.ts', 2)).toBe('x /a.ts /a.ts 2')
  })
})

describe('formatEditorLink', () => {
  it('should append the URL in angle brackets without a TTY', () => {
    expect(formatEditorLink('/repo/src/a.ts', 'src/a.ts', 3, { tty: false, editorCmd: IDEA })).toBe(
      'a.ts:3<idea://open?file=/repo/src/a.ts&line=3>'
    )
  })

  it('should emit OSC-8 hyperlinks on a TTY', () => {
    expect(formatEditorLink('/repo/src/a.ts', 'src/a.ts', 3, { tty: true })).toBe(
      '\u001b]8;;vscode://file//repo/src/a.ts:3\u0007a.ts:3\u001b]8;;\u0007'
    )
  })

  it('should print the bare label without a template', () => {
    expect(formatEditorLink('/repo/src/a.ts', 'src/a.ts', 3, { tty: false })).toBe('a.ts:3')
  })
})

describe('lineLinkFormatter', () => {
  it('should print line numbers unless a template is configured', () => {
    expect(lineLinkFormatter({ tty: true })('/repo/a.ts', 7)).toBe('7')
    expect(lineLinkFormatter({ tty: false, editorCmd: IDEA })('/repo/a.ts', 7)).toBe(
      '7<idea://open?file=/repo/a.ts&line=7>'
    )
  })

  it('should link a custom label to its line', () => {
    expect(lineLinkFormatter({ tty: false })('/repo/a.ts', 7, '7-9')).toBe('7-9')
    expect(lineLinkFormatter({ tty: false, editorCmd: IDEA })('/repo/a.ts', 7, '7-9')).toBe(
      '7-9<idea://open?file=/repo/a.ts&line=7>'
    )
  })
})
