import { Component } from 'react';
import type { ErrorInfo, ReactNode } from 'react';
import { isWidgetError } from '../../utils/widgetErrors';

type FallbackRender = (error: Error, reset: () => void) => ReactNode;

interface Props {
  children: ReactNode;
  fallback?: ReactNode | FallbackRender;
  onError?: (error: Error, errorInfo: ErrorInfo) => void;
}

interface State {
  error: Error | null;
}

/**
 * Error boundary for widget trees. A widget constructed with bad options
 * throws a WidgetError while rendering; this shows a fallback panel in its
 * place instead of unmounting the whole page.
 */
class ErrorBoundary extends Component<Props, State> {
  constructor(props: Props) {
    super(props);
    this.state = { error: null };
  }

  static getDerivedStateFromError(error: Error): State {
    return { error };
  }

  componentDidCatch(error: Error, errorInfo: ErrorInfo): void {
    console.error('[ErrorBoundary] widget failed to render:', error, errorInfo);
    this.props.onError?.(error, errorInfo);
  }

  handleReset = (): void => {
    this.setState({ error: null });
  };

  render(): ReactNode {
    const { error } = this.state;
    if (!error) {
      return this.props.children;
    }

    const { fallback } = this.props;
    if (typeof fallback === 'function') {
      return fallback(error, this.handleReset);
    }
    if (fallback !== undefined) {
      return fallback;
    }

    return (
      <div
        role="alert"
        style={{
          padding: '12px',
          backgroundColor: 'rgba(255, 59, 59, 0.1)',
          border: '1px solid rgba(255, 59, 59, 0.3)',
          borderRadius: '6px',
          color: '#b00020',
          fontFamily: 'Arial, Helvetica, sans-serif',
        }}
      >
        <strong>{isWidgetError(error) ? 'Widget configuration error' : 'Widget failed to render'}</strong>
        <p style={{ margin: '8px 0' }}>{error.message}</p>
        <button
          onClick={this.handleReset}
          style={{
            padding: '4px 12px',
            border: '1px solid rgba(0, 0, 0, 0.2)',
            borderRadius: '4px',
            cursor: 'pointer',
          }}
        >
          Try Again
        </button>
      </div>
    );
  }
}

export default ErrorBoundary;
