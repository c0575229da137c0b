import { StrictMode, Component } from 'react'
import type { ReactNode } from 'react'
import { createRoot } from 'react-dom/client'
import './index.css'
import App from './App.tsx'

function showFatal(message: string) {
  const root = document.getElementById('root')
  if (!root) return
  const pre = document.createElement('pre')
  pre.style.cssText = 'padding:16px;white-space:pre-wrap'
  pre.textContent = message
  root.replaceChildren(pre)
}

window.addEventListener('error', (e) => showFatal(String(e.error ?? e.message)))
window.addEventListener('unhandledrejection', (e) => showFatal(String(e.reason)))

interface ErrorBoundaryState { error: Error | null }

class ErrorBoundary extends Component<{ children: ReactNode }, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null }
  static getDerivedStateFromError(error: Error) { return { error } }
  render() {
    if (this.state.error) {
      return (
        <div className="fatal">
          <h2>Something went wrong</h2>
          <p>The calculator hit an unexpected error. Reload the page to start again.</p>
          <button className="primary-btn" onClick={() => window.location.reload()}>Reload</button>
          <details>
            <summary>Error details</summary>
            <pre>{this.state.error.message}</pre>
          </details>
        </div>
      )
    }
    return this.props.children
  }
}

const container = document.getElementById('root')
if (!container) throw new Error('Missing #root element')

createRoot(container).render(
  <StrictMode>
    <ErrorBoundary>
      <App />
    </ErrorBoundary>
  </StrictMode>,
)
