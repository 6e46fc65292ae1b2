import { Point } from '../src/utils/dashboard-layout.js';
import { renderDashboard } from '../src/utils/dashboard-renderer.js';
import { DrawingSurface, LineStyle, RectStyle, SvgSurface, TextStyle } from '../src/utils/drawing-surface.js';
import { failedResult, okResult, sampleAt, scenarioADay } from './fixtures.js';

type DrawCall =
  | { kind: 'rect'; x: number; y: number; width: number; height: number; style: RectStyle }
  | { kind: 'line'; from: Point; to: Point; style: LineStyle }
  | { kind: 'polyline'; points: readonly Point[]; style: LineStyle }
  | { kind: 'text'; x: number; y: number; text: string; style: TextStyle };

class RecordingSurface implements DrawingSurface {
  readonly calls: DrawCall[] = [];

  constructor(readonly width: number, readonly height: number) {}

  drawRect(x: number, y: number, width: number, height: number, style: RectStyle): void {
    this.calls.push({ kind: 'rect', x, y, width, height, style });
  }

  drawLine(from: Point, to: Point, style: LineStyle): void {
    this.calls.push({ kind: 'line', from, to, style });
  }

  drawPolyline(points: readonly Point[], style: LineStyle): void {
    this.calls.push({ kind: 'polyline', points, style });
  }

  drawText(x: number, y: number, text: string, style: TextStyle): void {
    this.calls.push({ kind: 'text', x, y, text, style });
  }

  texts(): string[] {
    return this.calls.flatMap((call) => (call.kind === 'text' ? [call.text] : []));
  }
}

const createRecordingSurface = (width: number, height: number) => new RecordingSurface(width, height);

describe('renderDashboard', () => {
  test('signals nothing to draw without creating a surface', () => {
    const createSurface = jest.fn(createRecordingSurface);
    expect(renderDashboard([failedResult('Farley'), okResult('Rumney', [])], createSurface)).toBeNull();
    expect(createSurface).not.toHaveBeenCalled();
  });

  test('sizes the surface by location count', () => {
    const surface = renderDashboard(
      [okResult('Farley', scenarioADay()), failedResult('Rumney')],
      createRecordingSurface,
    );
    expect(surface?.width).toBe(1200);
    expect(surface?.height).toBe(600);
  });

  test('draws favorability shading with its opacity', () => {
    const surface = renderDashboard(
      [okResult('Farley', [sampleAt('2026-10-19T21:00', 60, 60), ...scenarioADay('2026-10-20')])],
      createRecordingSurface,
    );
    const shading = surface?.calls.filter((call) => call.kind === 'rect' && call.style.fill === '#008000') ?? [];
    expect(shading).toHaveLength(1);
    const [shade] = shading;
    expect(shade.kind === 'rect' ? shade.style.opacity : undefined).toBeCloseTo(0.606, 3);
    expect(surface?.texts()).toEqual(expect.arrayContaining(['Farley', 'Tue', 'T: 70°F, H: 55%', 'Temp (°F)', 'Humidity (%)']));
  });

  test('draws only a title for a failed location and labels unknown days', () => {
    const surface = renderDashboard(
      [
        failedResult('Rumney'),
        okResult('The Gunks', [
          sampleAt('2026-10-20T12:00', 55, 60),
          sampleAt('2026-10-21T06:00', 50, 70, 2),
          sampleAt('2026-10-21T09:30', 58, 60),
        ]),
      ],
      createRecordingSurface,
    );
    const rumneyCalls = surface?.calls.filter((call) => 'y' in call && call.y < 300) ?? [];
    expect(rumneyCalls).toEqual([expect.objectContaining({ kind: 'text', text: 'Rumney' })]);
    expect(surface?.texts()).toEqual(expect.arrayContaining(['The Gunks', 'Wed', 'T: TBD, H: TBD', '☔', '0.08 in']));
  });

  test('draws the frame and date ticks under a failed bottom location', () => {
    const surface = renderDashboard(
      [okResult('Farley', [sampleAt('2026-10-19T21:00', 60, 60), ...scenarioADay('2026-10-20')]), failedResult('Hanging Mountain')],
      createRecordingSurface,
    );
    const bottomCalls = surface?.calls.filter((call) => 'y' in call && call.y >= 300) ?? [];
    expect(bottomCalls.map((call) => (call.kind === 'text' ? call.text : call.kind))).toEqual([
      'Hanging Mountain',
      'rect',
      'Tue 10/20',
      'Wed 10/21',
    ]);
    expect(bottomCalls[1]).toMatchObject({ kind: 'rect', x: 80, y: 344, width: 1040, height: 216 });
  });
});

describe('SvgSurface', () => {
  test('escapes text and rounds coordinates', () => {
    const surface = new SvgSurface(100, 50);
    surface.drawText(10.123, 20, 'Rock & <Roll>', { fill: '#000000', fontSize: 12, anchor: 'middle', bold: true });
    surface.drawRect(1, 2, 3, 4, { fill: '#008000', opacity: 0.60606 });
    surface.drawPolyline([[0, 0], [5.556, 6]], { stroke: '#0000ff', strokeWidth: 1 });

    const svg = surface.toSvg().split('\n');
    expect(svg[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50" font-family="DejaVu Sans, Arial, sans-serif">',
    );
    expect(svg[2]).toBe('<text x="10.12" y="20" fill="#000000" font-size="12" text-anchor="middle" font-weight="bold">Rock &amp; &lt;Roll&gt;</text>');
    expect(svg[3]).toBe('<rect x="1" y="2" width="3" height="4" fill="#008000" opacity="0.61"/>');
    expect(svg[4]).toBe('<polyline points="0,0 5.56,6" fill="none" stroke="#0000ff" stroke-width="1"/>');
    expect(svg[5]).toBe('</svg>');
  });

  test('skips empty polylines', () => {
    const surface = new SvgSurface(10, 10);
    surface.drawPolyline([], { stroke: '#000000', strokeWidth: 1 });
    expect(surface.toSvg().split('\n')).toHaveLength(3);
  });
});
