// Output formatting for the mailquery CLI.
// Data goes to stdout as YAML (js-yaml), hints and progress to stderr.
// In TTY mode YAML keys are dimmed and list dashes cyan; piped output is
// plain. Line wrapping is off everywhere.
//
// HTML message bodies are rendered as markdown: turndown converts, remark
// normalizes.

import yaml from 'js-yaml'
import TurndownService from 'turndown'
import { remark } from 'remark'
import pc from 'picocolors'
import { AuthError } from './api-utils.js'

const isTTY = process.stdout.isTTY ?? false

// ---------------------------------------------------------------------------
// Turndown instance (HTML -> Markdown)
// ---------------------------------------------------------------------------

const turndown = new TurndownService({
  headingStyle: 'atx',
  codeBlockStyle: 'fenced',
  bulletListMarker: '-',
})

// 1x1 tracking images
turndown.addRule('tracking-pixels', {
  filter: (node) => {
    if (node.nodeName !== 'IMG') return false
    const width = node.getAttribute('width')
    const height = node.getAttribute('height')
    return (width === '1' || width === '0') && (height === '1' || height === '0')
  },
  replacement: () => '',
})

turndown.addRule('strip-style', {
  filter: ['style', 'head', 'script'],
  replacement: () => '',
})

turndown.addRule('images', {
  filter: 'img',
  replacement: (_content, node) => {
    const alt = node.getAttribute('alt') ?? ''
    return alt ? `[image: ${alt}]` : ''
  },
})

// Layout tables (role="presentation", explicit width/align) only pass their content through.
turndown.addRule('layout-tables', {
  filter: (node) => {
    if (node.nodeName !== 'TABLE') return false
    if ((node.getAttribute('role') ?? '').toLowerCase() === 'presentation') return true
    return Boolean(node.getAttribute('width') || node.getAttribute('align'))
  },
  replacement: (content) => content,
})

// Preheaders and anything hidden with inline CSS
turndown.addRule('hidden-elements', {
  filter: (node) => {
    const style = node.getAttribute('style') ?? ''
    if (/display\s*:\s*none/i.test(style)) return true
    return node.hasAttribute('hidden')
  },
  replacement: () => '',
})

// ---------------------------------------------------------------------------
// Body rendering
// ---------------------------------------------------------------------------

export function htmlToMarkdown(html: string): string {
  const cleaned = html.replace(/<!--[\s\S]*?-->/g, '')

  const md = turndown.turndown(cleaned).replace(/[\u00A0\u200B\u200C\u200D\uFEFF]/g, ' ')
  const normalized = remark().processSync(md).toString()

  // remark escapes the bracket of our [image: ...] placeholders
  return normalized.replace(/\\\[image:/g, '[image:').trim()
}

export function renderEmailBody(body: string, mimeType: string): string {
  if (mimeType === 'text/html') {
    return htmlToMarkdown(body)
  }
  return body.trim()
}

// ---------------------------------------------------------------------------
// YAML output
// ---------------------------------------------------------------------------

function colorizeYaml(yamlStr: string): string {
  return yamlStr.replace(
    /^(\s*)(- )?([\w_][\w_ ]*?)(:)/gm,
    (_match, indent: string, dash: string | undefined, key: string, colon: string) => {
      const prefix = dash ? `${indent}${pc.cyan(dash)}` : indent
      return `${prefix}${pc.dim(key)}${pc.dim(colon)}`
    },
  )
}

export function toYaml(data: unknown): string {
  return yaml.dump(data, {
    lineWidth: Infinity,
    noRefs: true,
    quotingType: "'",
    sortKeys: false,
  })
}

/** Print any value as YAML to stdout. */
export function printYaml(data: unknown): void {
  const str = toYaml(data)
  process.stdout.write(isTTY ? colorizeYaml(str) : str)
}

/**
 * Print a list of items as YAML.
 *   items:
 *     - key: value
 *   total: 3
 */
export function printList(items: Record<string, unknown>[], opts?: { total?: number }): void {
  const doc: Record<string, unknown> = { items }
  if (opts?.total !== undefined) doc.total = opts.total
  printYaml(doc)
}

// ---------------------------------------------------------------------------
// Dates
// ---------------------------------------------------------------------------

/** "5m ago" style for the last week, a short date after that. */
export function formatDate(date: Date, now = Date.now()): string {
  if (isNaN(date.getTime())) return ''

  const diffMs = now - date.getTime()
  const diffMins = Math.floor(diffMs / 60000)
  const diffHours = Math.floor(diffMs / 3600000)
  const diffDays = Math.floor(diffMs / 86400000)

  if (diffMins < 1) return 'just now'
  if (diffMins < 60) return `${diffMins}m ago`
  if (diffHours < 24) return `${diffHours}h ago`
  if (diffDays < 7) return `${diffDays}d ago`
  if (diffDays < 365) {
    return date.toLocaleDateString(undefined, { month: 'short', day: 'numeric' })
  }
  return date.toLocaleDateString(undefined, { month: 'short', day: 'numeric', year: 'numeric' })
}

// ---------------------------------------------------------------------------
// Stderr hints
// ---------------------------------------------------------------------------

export function hint(msg: string): void {
  process.stderr.write(pc.dim(`# ${msg}`) + '\n')
}

export function success(msg: string): void {
  process.stderr.write(pc.green(msg) + '\n')
}

export function error(msg: string): void {
  process.stderr.write(pc.red(msg) + '\n')
}

/** Ask a y/N question on stderr. Non-interactive sessions always answer no. */
export async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) return false
  const readline = await import('node:readline')
  const rl = readline.createInterface({ input: process.stdin, output: process.stderr })
  const answer = await new Promise<string>((resolve) => {
    rl.question(`${question} [y/N] `, resolve)
  })
  rl.close()
  return answer.trim().toLowerCase() === 'y'
}

/** Print the error to stderr and exit. AuthError gets a login hint. */
export function handleCommandError(err: Error): never {
  if (err instanceof AuthError) {
    error(`${err.message}. Check the credentials in MAILQUERY_TOKEN_FILE`)
  } else {
    error(err.message)
  }
  process.exit(1)
}
