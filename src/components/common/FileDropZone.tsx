import { useState, useRef, memo, type DragEvent } from 'react'
import { FileUp } from 'lucide-react'
import { formatFileSize, hasExtension } from '@/utils/fileReader.ts'

export type DropRejection = 'type' | 'size'

interface FileDropZoneProps {
  /** First file of a drop or pick, once it passes the type and size checks. */
  onFile: (file: File) => void
  onRejected?: (file: File, reason: DropRejection) => void
  /** Without the dot; empty accepts any type. */
  extensions?: string[]
  label?: string
  description?: string
  maxSizeMB?: number
  className?: string
}

export const FileDropZone = memo(function FileDropZone({
  onFile,
  onRejected,
  extensions = [],
  label = 'Drop a file here',
  description = 'or click to browse',
  maxSizeMB = 100,
  className = '',
}: FileDropZoneProps) {
  // dragenter/dragleave fire for every child crossed, so count depth
  const [dragDepth, setDragDepth] = useState(0)
  const inputRef = useRef<HTMLInputElement>(null)
  const maxBytes = maxSizeMB * 1024 * 1024
  const active = dragDepth > 0

  const take = (list: FileList | null) => {
    const file = list?.[0]
    if (!file) return
    if (extensions.length > 0 && !hasExtension(file, extensions)) onRejected?.(file, 'type')
    else if (file.size > maxBytes) onRejected?.(file, 'size')
    else onFile(file)
  }

  const onDrop = (e: DragEvent) => {
    e.preventDefault()
    setDragDepth(0)
    take(e.dataTransfer.files)
  }

  return (
    <div
      onDragEnter={(e) => { e.preventDefault(); setDragDepth((d) => d + 1) }}
      onDragLeave={(e) => { e.preventDefault(); setDragDepth((d) => Math.max(0, d - 1)) }}
      onDragOver={(e) => e.preventDefault()}
      onDrop={onDrop}
      onClick={() => inputRef.current?.click()}
      className={`
        m-6 flex flex-col items-center justify-center gap-1 rounded-xl border-2 border-dashed px-6 py-12
        cursor-pointer transition-colors
        ${active ? 'border-accent bg-accent/10' : 'border-white/[0.12] hover:border-white/[0.2] hover:bg-white/[0.03]'}
        ${className}
      `}
    >
      <FileUp size={26} className={`mb-3 ${active ? 'text-accent' : 'text-white/30'}`} />
      <p className="text-sm font-medium text-white">{label}</p>
      <p className="text-xs text-white/40">{description}</p>
      <p className="text-[10px] text-white/25 mt-2">
        {extensions.length > 0 && `${extensions.map((x) => x.toUpperCase()).join(', ')} · `}
        up to {formatFileSize(maxBytes)}
      </p>
      <input
        ref={inputRef}
        type="file"
        data-testid="file-input"
        accept={extensions.map((x) => `.${x}`).join(',') || undefined}
        onChange={(e) => {
          take(e.target.files)
          e.target.value = ''
        }}
        className="hidden"
      />
    </div>
  )
})
