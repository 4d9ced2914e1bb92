/**
 * Line-level reader and writer for the persisted configuration text.
 *
 * The text is a sequence of `[section]` headers, each followed by
 * `key = value` lines. Values are kept as raw text here; decoding them is
 * the value codec's job.
 */

import type { LoadIssue } from '../../core/errors.js'

export interface RawEntry {
  key: string
  raw: string
  /** 1-based line number in the source text (absent for entries created at run time) */
  line?: number
}

export interface RawSection {
  name: string
  entries: RawEntry[]
}

export interface ParsedConfigText {
  sections: RawSection[]
  issues: LoadIssue[]
}

const SECTION_RE = /^\[([^\]]+)\]$/
const ENTRY_RE = /^([^=\s][^=]*?)\s*=\s*(.*)$/

/**
 * Split config text into ordered sections and raw entries.
 *
 * Problems are collected as `CONFIG_SYNTAX` issues rather than thrown so a
 * single load can report every broken line.
 */
export function parseConfigText(text: string): ParsedConfigText {
  const sections: RawSection[] = []
  const issues: LoadIssue[] = []
  const seenKeys = new Map<string, Set<string>>()
  let current: RawSection | null = null

  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = index + 1
    const trimmed = rawLine.trim()
    if (trimmed === '' || trimmed.startsWith('#') || trimmed.startsWith(';')) return

    const header = SECTION_RE.exec(trimmed)
    if (header !== null) {
      const name = (header[1] ?? '').trim()
      if (seenKeys.has(name)) {
        issues.push({
          code: 'CONFIG_SYNTAX',
          message: `Duplicate section "[${name}]"`,
          section: name,
          line,
        })
        current = sections.find((s) => s.name === name) ?? null
        return
      }
      current = { name, entries: [] }
      sections.push(current)
      seenKeys.set(name, new Set())
      return
    }

    const entry = ENTRY_RE.exec(trimmed)
    if (entry === null) {
      issues.push({
        code: 'CONFIG_SYNTAX',
        message: `Expected "[section]" or "key = value", got "${trimmed}"`,
        line,
      })
      return
    }

    const keyName = (entry[1] ?? '').trim()
    const raw = entry[2] ?? ''
    if (current === null) {
      issues.push({
        code: 'CONFIG_SYNTAX',
        message: `Key "${keyName}" appears before any section header`,
        key: keyName,
        raw,
        line,
      })
      return
    }

    const keys = seenKeys.get(current.name)
    if (keys?.has(keyName)) {
      issues.push({
        code: 'CONFIG_SYNTAX',
        message: `Duplicate key "${keyName}"`,
        section: current.name,
        key: keyName,
        raw,
        line,
      })
      return
    }
    keys?.add(keyName)
    current.entries.push({ key: keyName, raw, line })
  })

  return { sections, issues }
}

/** Render sections back to config text, one blank line between sections */
export function formatConfigText(sections: readonly RawSection[]): string {
  const blocks = sections.map((section) => {
    const lines = [`[${section.name}]`]
    for (const entry of section.entries) {
      lines.push(`${entry.key} = ${entry.raw}`.trimEnd())
    }
    return lines.join('\n')
  })
  return blocks.length === 0 ? '' : `${blocks.join('\n\n')}\n`
}
