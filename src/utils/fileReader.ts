export function readFileAsText(file: File): Promise<string> {
  return file.text()
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB']

/** `512 B`, `1.5 KB`, `100.0 MB`. */
export function formatFileSize(bytes: number): string {
  let size = bytes
  let unit = 0
  while (size >= 1024 && unit < SIZE_UNITS.length - 1) {
    size /= 1024
    unit++
  }
  return unit === 0 ? `${size} B` : `${size.toFixed(1)} ${SIZE_UNITS[unit]}`
}

export function hasExtension(file: File, extensions: string[]): boolean {
  const dot = file.name.lastIndexOf('.')
  if (dot < 0) return false
  return extensions.includes(file.name.slice(dot + 1).toLowerCase())
}
