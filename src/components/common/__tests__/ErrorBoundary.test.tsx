import { fireEvent, render, screen } from '@testing-library/react';
import { vi } from 'vitest';
import { WidgetError } from '../../../utils/widgetErrors';
import ErrorBoundary from '../ErrorBoundary';

let failure: Error | null = null;

function Flaky() {
  if (failure) throw failure;
  return <span>rendered</span>;
}

describe('ErrorBoundary', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    failure = null;
    vi.restoreAllMocks();
  });

  it('renders children when nothing throws', () => {
    render(
      <ErrorBoundary>
        <Flaky />
      </ErrorBoundary>,
    );
    expect(screen.getByText('rendered')).toBeInTheDocument();
  });

  it('shows widget configuration errors with their message', () => {
    failure = new WidgetError('LED', 'size must be greater than zero');
    render(
      <ErrorBoundary>
        <Flaky />
      </ErrorBoundary>,
    );
    const alert = screen.getByRole('alert');
    expect(alert).toHaveTextContent('Widget configuration error');
    expect(alert).toHaveTextContent('LED size must be greater than zero');
  });

  it('labels other errors as render failures', () => {
    failure = new Error('canvas exploded');
    render(
      <ErrorBoundary>
        <Flaky />
      </ErrorBoundary>,
    );
    expect(screen.getByRole('alert')).toHaveTextContent('Widget failed to render');
  });

  it('logs the error and reports it to onError', () => {
    const error = new WidgetError('Dial', 'min cannot be equal to the max');
    failure = error;
    const onError = vi.fn();
    render(
      <ErrorBoundary onError={onError}>
        <Flaky />
      </ErrorBoundary>,
    );
    expect(onError).toHaveBeenCalledWith(error, expect.objectContaining({ componentStack: expect.any(String) }));
    expect(console.error).toHaveBeenCalledWith('[ErrorBoundary] widget failed to render:', error, expect.anything());
  });

  it('renders a custom fallback', () => {
    failure = new Error('boom');
    render(
      <ErrorBoundary fallback={<p>unavailable</p>}>
        <Flaky />
      </ErrorBoundary>,
    );
    expect(screen.getByText('unavailable')).toBeInTheDocument();
  });

  it('passes the error and a reset to a fallback function', () => {
    failure = new Error('boom');
    render(
      <ErrorBoundary
        fallback={(error, reset) => (
          <button onClick={reset}>retry after {error.message}</button>
        )}
      >
        <Flaky />
      </ErrorBoundary>,
    );
    failure = null;
    fireEvent.click(screen.getByRole('button', { name: 'retry after boom' }));
    expect(screen.getByText('rendered')).toBeInTheDocument();
  });

  it('tries again from the default panel', () => {
    failure = new Error('boom');
    render(
      <ErrorBoundary>
        <Flaky />
      </ErrorBoundary>,
    );
    failure = null;
    fireEvent.click(screen.getByRole('button', { name: 'Try Again' }));
    expect(screen.getByText('rendered')).toBeInTheDocument();
  });
});
