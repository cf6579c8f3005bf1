import { render, screen } from '@testing-library/react';
import { vi } from 'vitest';
import ErrorBoundary from '../../common/ErrorBoundary';
import DigitDisplay from '../DigitDisplay';

const digitNames = () => screen.getAllByRole('img').map((el) => el.getAttribute('aria-label'));

describe('DigitDisplay', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('pads a number with blank digits', () => {
    render(<DigitDisplay value={42} digits={4} />);
    expect(screen.getByRole('group', { name: 'Display 42' })).toBeInTheDocument();
    expect(digitNames()).toEqual(['Digit blank', 'Digit blank', 'Digit 4', 'Digit 2']);
  });

  it('updates each digit when the value changes', () => {
    const { rerender } = render(<DigitDisplay value={42} digits={4} />);
    rerender(<DigitDisplay value={7} digits={4} />);
    expect(digitNames()).toEqual(['Digit blank', 'Digit blank', 'Digit blank', 'Digit 7']);
  });

  it('shows hex values', () => {
    render(<DigitDisplay value={255} radix={16} />);
    expect(digitNames()).toEqual(['Digit f', 'Digit f']);
  });

  it('shows strings character by character', () => {
    render(<DigitDisplay value="c0de" />);
    expect(digitNames()).toEqual(['Digit c', 'Digit 0', 'Digit d', 'Digit e']);
  });

  it('passes size and colors to every digit', () => {
    render(<DigitDisplay value={8} digits={2} size={150} foreground="lime" />);
    const [first, second] = screen.getAllByRole('img');
    expect(first).toHaveAttribute('height', '150');
    expect(second).toHaveAttribute('width', '100');
  });

  it('rejects negative numbers', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    render(
      <ErrorBoundary>
        <DigitDisplay value={-3} />
      </ErrorBoundary>,
    );
    expect(screen.getByRole('alert')).toHaveTextContent(
      'DigitDisplay value "-3" must be a whole number greater than or equal to zero',
    );
  });

  it('rejects a digit count below one', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    render(
      <ErrorBoundary>
        <DigitDisplay value={1} digits={0} />
      </ErrorBoundary>,
    );
    expect(screen.getByRole('alert')).toHaveTextContent(
      'DigitDisplay digits must be a whole number greater than zero',
    );
  });
});
