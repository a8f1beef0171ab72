import { lazy, Suspense } from 'react'
import { Header } from '@/components/layout/Header.tsx'
import { Toast } from '@/components/common/Toast.tsx'
import { ErrorBoundary } from '@/components/common/ErrorBoundary.tsx'

const DeviationMapTool = lazy(() => import('@/tools/deviation-map/DeviationMapTool.tsx'))

function Spinner() {
  return (
    <div className="flex h-full items-center justify-center">
      <div className="h-6 w-6 animate-spin rounded-full border-2 border-accent/30 border-t-accent" />
    </div>
  )
}

export default function App() {
  return (
    <div className="flex h-full w-full flex-col">
      <Header />
      <main className="relative flex flex-1 flex-col overflow-hidden">
        <ErrorBoundary label="Deviation Map">
          <Suspense fallback={<Spinner />}>
            <DeviationMapTool />
          </Suspense>
        </ErrorBoundary>
      </main>
      <Toast />
    </div>
  )
}
