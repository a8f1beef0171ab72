import { memo } from 'react'
import { X, CheckCircle, AlertCircle, Info, AlertTriangle } from 'lucide-react'
import { useAppStore } from '@/stores/appStore.ts'
import type { Toast as ToastType } from '@/types/index.ts'

const variants: Record<ToastType['type'], { icon: typeof Info; box: string; tint: string }> = {
  success: { icon: CheckCircle, box: 'border-emerald-500/30 bg-emerald-500/10', tint: 'text-emerald-400' },
  error: { icon: AlertCircle, box: 'border-red-500/30 bg-red-500/10', tint: 'text-red-400' },
  info: { icon: Info, box: 'border-blue-500/30 bg-blue-500/10', tint: 'text-blue-400' },
  warning: { icon: AlertTriangle, box: 'border-amber-500/30 bg-amber-500/10', tint: 'text-amber-400' },
}

const ToastItem = memo(function ToastItem({ toast, onRemove }: { toast: ToastType; onRemove: (id: string) => void }) {
  const { icon: Icon, box, tint } = variants[toast.type]
  return (
    <div
      role={toast.type === 'error' ? 'alert' : 'status'}
      className={`flex items-start gap-3 px-4 py-3 rounded-lg border backdrop-blur-sm animate-slide-up ${box}`}
    >
      <Icon size={18} className={`mt-0.5 flex-shrink-0 ${tint}`} />
      <p className="text-sm text-white flex-1">{toast.message}</p>
      <button
        onClick={() => onRemove(toast.id)}
        aria-label="Dismiss"
        className="text-white/40 hover:text-white/70 transition-colors flex-shrink-0"
      >
        <X size={14} />
      </button>
    </div>
  )
})

export function Toast() {
  const toasts = useAppStore((s) => s.toasts)
  const removeToast = useAppStore((s) => s.removeToast)

  if (toasts.length === 0) return null

  return (
    <div className="fixed bottom-4 right-4 z-50 flex flex-col gap-2 max-w-sm">
      {toasts.map((toast) => (
        <ToastItem key={toast.id} toast={toast} onRemove={removeToast} />
      ))}
    </div>
  )
}
