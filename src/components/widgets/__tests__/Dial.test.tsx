import { act, render, screen } from '@testing-library/react';
import { vi } from 'vitest';
import { createDialStore } from '../../../stores/dialStore';
import { recordingFor } from '../../../test-utils/canvasMocks';
import ErrorBoundary from '../../common/ErrorBoundary';
import Dial from '../Dial';

const measure = (text: string) => text.length * 6;
const LABELS = ['60', '80', '100', '120', '140', '160', '180', '200', '220'];

describe('Dial', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('paints the scale and readout at the initial value', () => {
    render(<Dial measureText={measure} />);
    const canvas = screen.getByRole('img', { name: 'Dial 60' });
    expect(canvas).toHaveAttribute('width', '317');
    expect(canvas).toHaveStyle({ width: '317px', height: '317px' });

    const ctx = recordingFor(canvas);
    expect(ctx.calls.slice(0, 3).map((c) => [c.op, c.args])).toEqual([
      ['setTransform', [1, 0, 0, 1, 0, 0]],
      ['scale', [1, 1]],
      ['clearRect', [0, 0, 317, 317]],
    ]);
    expect(ctx.texts()).toEqual([...LABELS, '60']);
  });

  it('follows the value prop', () => {
    const { rerender } = render(<Dial measureText={measure} value={100} />);
    const ctx = recordingFor(screen.getByRole('img', { name: 'Dial 100' }));
    ctx.reset();

    rerender(<Dial measureText={measure} value={140} />);
    expect(screen.getByRole('img', { name: 'Dial 140' })).toBeInTheDocument();
    expect(ctx.texts()).toEqual([...LABELS, '140']);
  });

  it('can be driven through an external store', () => {
    const store = createDialStore({}, measure);
    render(<Dial store={store} />);
    const canvas = screen.getByRole('img', { name: 'Dial 60' });

    act(() => store.getState().setValue(300));
    expect(canvas).toHaveAccessibleName('Dial 300');
    const [readout] = recordingFor(canvas)
      .callsOf('fillText')
      .filter((c) => c.args[0] === '300');
    expect(readout.fillStyle).toBe('#ff0000');
  });

  it('names the unit with a degree sign', () => {
    render(<Dial measureText={measure} min={0} max={100} majorScale={10} semiMajorScale={5} unit="degF" />);
    const ctx = recordingFor(screen.getByRole('img', { name: 'Dial 0 °F' }));
    expect(ctx.texts().slice(-2)).toEqual(['0', '°F']);
  });

  it('hides shapes by tag', () => {
    render(<Dial measureText={measure} tagStyles={{ scale: { hidden: true } }} />);
    expect(recordingFor(screen.getByRole('img')).texts()).toEqual(['60']);
  });

  it('reports invalid options through the error boundary', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    render(
      <ErrorBoundary>
        <Dial size={0} />
      </ErrorBoundary>,
    );
    expect(screen.getByRole('alert')).toHaveTextContent('Dial size must be greater than zero');
  });
});
