// @vitest-environment jsdom
import { describe, it, expect, afterEach } from 'vitest';
import { cleanup, render } from '@testing-library/react';
import { Sparkline, sparklinePoints } from './Sparkline';

describe('sparklinePoints', () => {
  it('scales from zero to the largest value', () => {
    expect(sparklinePoints([0, 5, 10], 100, 30)).toEqual([
      { x: 0, y: 30 },
      { x: 50, y: 15 },
      { x: 100, y: 0 }
    ]);
  });

  it('keeps idle series on the baseline', () => {
    expect(sparklinePoints([0, 0], 100, 30)).toEqual([
      { x: 0, y: 30 },
      { x: 100, y: 30 }
    ]);
    expect(sparklinePoints([4], 100, 30)).toEqual([{ x: 0, y: 0 }]);
  });
});

describe('Sparkline', () => {
  afterEach(() => {
    cleanup();
  });

  it('draws a path through the points', () => {
    const { container } = render(<Sparkline data={[0, 5, 10]} showDots />);
    expect(container.querySelector('path')?.getAttribute('d')).toBe('M0,30 L50,15 L100,0');
    expect(container.querySelectorAll('circle')).toHaveLength(3);
  });

  it('draws a dashed baseline without data', () => {
    const { container } = render(<Sparkline data={[]} />);
    expect(container.querySelector('path')).toBeNull();
    expect(container.querySelector('line')?.getAttribute('stroke-dasharray')).toBe('2,2');
  });
});
