// src/sources/adf.ts

/**
 * Flatten an Atlassian Document Format node into plain text,
 * one text node per line, in document order.
 */
export function extractAdfText(node: unknown): string {
  const parts: string[] = []
  collectText(node, parts)
  return parts.join('\n')
}

function collectText(node: unknown, parts: string[]): void {
  if (Array.isArray(node)) {
    for (const child of node) collectText(child, parts)
    return
  }
  if (typeof node !== 'object' || node === null) return

  if ('text' in node && typeof node.text === 'string') {
    parts.push(node.text)
  }
  if ('content' in node) {
    collectText(node.content, parts)
  }
}

export function descriptionToText(description: unknown): string {
  if (description === null || description === undefined) return ''
  if (typeof description === 'string') return description
  return extractAdfText(description)
}
