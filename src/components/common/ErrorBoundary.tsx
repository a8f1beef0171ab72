import { Component, type ReactNode, type ErrorInfo } from 'react'

interface Props {
  children: ReactNode
  /** Tag for the console log line. */
  label?: string
  fallback?: ReactNode
}

interface State {
  error: Error | null
}

export class ErrorBoundary extends Component<Props, State> {
  state: State = { error: null }

  static getDerivedStateFromError(error: Error): State {
    return { error }
  }

  componentDidCatch(error: Error, info: ErrorInfo) {
    console.error(`[${this.props.label ?? 'App'}] Render failed:`, error, info.componentStack)
  }

  private reset = () => this.setState({ error: null })

  render() {
    const { error } = this.state
    if (!error) return this.props.children
    if (this.props.fallback !== undefined) return this.props.fallback

    return (
      <div className="flex flex-col items-center justify-center h-full p-8 text-center">
        <div className="w-12 h-12 rounded-xl bg-red-500/10 border border-red-500/20 flex items-center justify-center mb-4">
          <span className="text-red-400 text-lg">!</span>
        </div>
        <h3 className="text-sm font-semibold text-white mb-1">Something went wrong</h3>
        <p className="text-xs text-white/40 max-w-sm mb-4">{error.message || 'An unexpected error occurred'}</p>
        <button
          onClick={this.reset}
          className="px-4 py-2 text-xs font-medium bg-white/[0.08] border border-white/[0.12] rounded-lg text-white hover:bg-white/[0.12] transition-colors"
        >
          Try Again
        </button>
      </div>
    )
  }
}
