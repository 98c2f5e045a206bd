import * as path from 'node:path'
import type { IFileStat, IFileSystem } from '../interfaces/filesystem.js'

export interface DirectoryEntry {
  name: string
  stat: IFileStat
}

export async function readDirectoryEntries(
  fs: IFileSystem,
  dirPath: string,
): Promise<DirectoryEntry[]> {
  const names = await fs.readdir(dirPath)

  const entries: DirectoryEntry[] = []
  for (const name of names) {
    try {
      entries.push({ name, stat: await fs.stat(path.join(dirPath, name)) })
    } catch {
      // Dangling symlinks and entries removed mid-listing are left out
    }
  }

  // Directories first, then by name
  entries.sort((a, b) => {
    if (a.stat.isDirectory !== b.stat.isDirectory) {
      return a.stat.isDirectory ? -1 : 1
    }
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0
  })
  return entries
}

/**
 * HTML index for `urlPath`, which always ends in "/" since directory
 * requests without one are redirected first.
 */
export function renderDirectoryListing(
  urlPath: string,
  entries: DirectoryEntry[],
): string {
  const title = `Index of ${escapeHtml(urlPath)}`
  const rows: string[] = []

  if (urlPath !== '/') {
    rows.push('<tr><td><a href="../">../</a></td><td>-</td></tr>')
  }

  for (const entry of entries) {
    const suffix = entry.stat.isDirectory ? '/' : ''
    const href = encodeURIComponent(entry.name) + suffix
    const size = entry.stat.isDirectory ? '-' : formatSize(entry.stat.size)
    rows.push(
      `<tr><td><a href="${href}">${escapeHtml(entry.name + suffix)}</a></td><td>${size}</td></tr>`,
    )
  }

  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title}</title>`,
    '</head>',
    '<body>',
    `<h1>${title}</h1>`,
    '<table>',
    '<thead><tr><th>Name</th><th>Size</th></tr></thead>',
    '<tbody>',
    ...rows,
    '</tbody>',
    '</table>',
    '</body>',
    '</html>',
    '',
  ].join('\n')
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`
}

function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
}
