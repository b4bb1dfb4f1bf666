// Tests for message body rendering and YAML/date helpers.

import { expect, test } from 'vitest'
import { formatDate, htmlToMarkdown, renderEmailBody, toYaml } from './output.js'

// ---------------------------------------------------------------------------
// Simple HTML
// ---------------------------------------------------------------------------

test('simple inline tags', () => {
  expect(htmlToMarkdown('<p>Hello <b>bold</b> and <em>italic</em> world</p>')).toBe('Hello **bold** and *italic* world')
})

test('headings and paragraphs', () => {
  expect(htmlToMarkdown('<h1>Title</h1><p>Paragraph one.</p><h2>Subtitle</h2><p>Paragraph two.</p>')).toBe(
    '# Title\n\nParagraph one.\n\n## Subtitle\n\nParagraph two.',
  )
})

test('links', () => {
  expect(htmlToMarkdown('<p>Visit <a href="https://example.com">our site</a> today.</p>')).toBe(
    'Visit [our site](https://example.com) today.',
  )
})

test('unordered list', () => {
  expect(htmlToMarkdown('<ul><li>One</li><li>Two</li><li>Three</li></ul>')).toBe('* One\n* Two\n* Three')
})

test('ordered list', () => {
  expect(htmlToMarkdown('<ol><li>First</li><li>Second</li><li>Third</li></ol>')).toBe('1. First\n2. Second\n3. Third')
})

// ---------------------------------------------------------------------------
// Message noise
// ---------------------------------------------------------------------------

test('strips 1x1 tracking pixels', () => {
  expect(htmlToMarkdown('<p>Hello</p><img src="https://example.com/p.gif" width="1" height="1"><p>World</p>')).toBe(
    'Hello\n\nWorld',
  )
})

test('replaces images with alt text placeholder', () => {
  expect(htmlToMarkdown('<img src="https://example.com/logo.png" alt="Company Logo">')).toBe('[image: Company Logo]')
})

test('strips images without alt text', () => {
  expect(htmlToMarkdown('<p>Before</p><img src="https://example.com/spacer.png"><p>After</p>')).toBe('Before\n\nAfter')
})

test('unwraps layout table with width attribute', () => {
  expect(htmlToMarkdown(`
    <table width="600" cellpadding="0" cellspacing="0">
      <tr><td>
        <h1>Welcome</h1>
        <p>This is inside a layout table.</p>
      </td></tr>
    </table>
  `)).toBe('# Welcome\n\nThis is inside a layout table.')
})

test('unwraps table with role=presentation', () => {
  expect(htmlToMarkdown(`
    <table role="presentation">
      <tr><td><p>Presented content</p></td></tr>
    </table>
  `)).toBe('Presented content')
})

test('strips display:none elements', () => {
  expect(htmlToMarkdown('<div style="display:none">Hidden</div><p>Visible</p>')).toBe('Visible')
})

test('strips style and script tags', () => {
  expect(htmlToMarkdown('<style>.foo { color: red; }</style><p>Content</p>')).toBe('Content')
  expect(htmlToMarkdown('<script>alert("x")</script><p>Safe content</p>')).toBe('Safe content')
})

test('combined noise removal', () => {
  expect(htmlToMarkdown(`
    <span class="preheader" style="display:none">Preview: deals inside</span>
    <img src="https://example.com/open?id=abc" width="1" height="1">
    <table width="600" align="center" cellpadding="0" cellspacing="0">
      <tr><td>
        <h1>Quarterly update</h1>
        <p>Revenue is <b>up</b> this quarter.</p>
        <p><a href="https://example.com/report">Read the report</a></p>
      </td></tr>
    </table>
    <img src="https://example.com/b" width="0" height="0">
  `)).toBe('# Quarterly update\n\nRevenue is **up** this quarter.\n\n[Read the report](https://example.com/report)')
})

// ---------------------------------------------------------------------------
// renderEmailBody
// ---------------------------------------------------------------------------

test('renderEmailBody trims plain text', () => {
  expect(renderEmailBody('  Hello, plain text.\n\nSecond paragraph.\n', 'text/plain')).toBe(
    'Hello, plain text.\n\nSecond paragraph.',
  )
})

test('renderEmailBody converts HTML', () => {
  expect(renderEmailBody('<p>Hello <b>world</b></p>', 'text/html')).toBe('Hello **world**')
})

// ---------------------------------------------------------------------------
// YAML and dates
// ---------------------------------------------------------------------------

test('toYaml keeps key order and does not wrap', () => {
  expect(toYaml({ name: 'Work/Clients', total: 3, labels: ['a', 'b'] })).toBe(
    'name: Work/Clients\ntotal: 3\nlabels:\n  - a\n  - b\n',
  )
})

test('formatDate relative ranges', () => {
  const now = Date.UTC(2026, 0, 15, 12, 0, 0)
  expect(formatDate(new Date(now - 20_000), now)).toBe('just now')
  expect(formatDate(new Date(now - 5 * 60_000), now)).toBe('5m ago')
  expect(formatDate(new Date(now - 3 * 3_600_000), now)).toBe('3h ago')
  expect(formatDate(new Date(now - 2 * 86_400_000), now)).toBe('2d ago')
  expect(formatDate(new Date(Number.NaN), now)).toBe('')
})
