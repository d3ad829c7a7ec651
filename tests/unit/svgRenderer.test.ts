import { RenderRefusedError } from '../../src/shared/errors';
import { buildMapSpec } from '../../src/shared/engine/mapSpec';
import { TableSize } from '../../src/shared/engine/tableSize';
import { renderMapSvg } from '../../src/shared/render/svgRenderer';
import type { RenderOptions } from '../../src/shared/render/svgRenderer';

const OPEN = '<svg xmlns="http://www.w3.org/2000/svg" width="1200" height="1200" viewBox="0 0 1200 1200">';
const TEXT_ATTRS =
  'fill="#000000" font-size="16" font-family="Arial, sans-serif" text-anchor="middle" dominant-baseline="middle" font-weight="bold"';

function render(shapes: unknown[], options: RenderOptions = {}): string {
  const result = renderMapSvg(buildMapSpec(TableSize.standard(), shapes), undefined, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.svg;
}

describe('renderMapSvg', () => {
  it('renders an empty map as a bare document', () => {
    expect(render([])).toBe(`${OPEN}</svg>`);
  });

  it('renders a rect with type defaults', () => {
    expect(render([{ type: 'rect', x: 0, y: 0, width: 1200, height: 1200 }])).toBe(
      `${OPEN}<rect x="0" y="0" width="1200" height="1200" fill="rgba(128,128,128,0.2)" stroke="#666666" stroke-width="2"/></svg>`
    );
  });

  it('renders polygons as integer point lists', () => {
    const svg = render([
      {
        type: 'polygon',
        points: [
          { x: 0, y: 0 },
          { x: 100, y: 0 },
          { x: 0, y: 100 },
        ],
      },
    ]);
    expect(svg).toContain(
      '<polygon points="0,0 100,0 0,100" fill="rgba(250,100,100,0.3)" stroke="#c04040" stroke-width="2"/>'
    );
  });

  it('uses layer paint and drops unsafe paint values', () => {
    const svg = render([
      {
        type: 'circle',
        cx: 300,
        cy: 300,
        r: 50,
        layer: 'scenography',
        fill: 'url(#evil)',
        stroke: '#ABC',
      },
    ]);
    expect(svg).toContain(
      '<circle cx="300" cy="300" r="50" fill="rgba(120,120,120,0.35)" stroke="#ABC" stroke-width="2"/>'
    );
  });

  it('draws shape labels after every shape, at the shape centre', () => {
    const svg = render([
      { type: 'rect', x: 100, y: 100, width: 200, height: 100, label: 'Wall' },
      { type: 'circle', cx: 900, cy: 900, r: 40 },
    ]);
    expect(svg.endsWith(`<text x="200" y="150" ${TEXT_ATTRS}>Wall</text></svg>`)).toBe(true);
    expect(svg.indexOf('<circle')).toBeLessThan(svg.indexOf('<text'));
  });

  it('escapes label text', () => {
    const svg = render([
      {
        type: 'circle',
        cx: 600,
        cy: 600,
        r: 25,
        layer: 'objective',
        label: '<script>alert("x")</script>',
      },
    ]);
    expect(svg).toContain(
      `<text x="600" y="550" ${TEXT_ATTRS}>&lt;script&gt;alert(&quot;x&quot;)&lt;/script&gt;</text>`
    );
    expect(svg).not.toContain('<script>');
  });

  it('rotates objective labels pushed to the side of the marker', () => {
    const svg = render([
      { type: 'circle', cx: 30, cy: 600, r: 25, layer: 'objective', label: 'Relic' },
    ]);
    expect(svg).toContain(
      `<g transform="rotate(90 80 600)"><text x="80" y="600" ${TEXT_ATTRS}>Relic</text></g>`
    );
  });

  it('omits labels when asked to', () => {
    const svg = render([{ type: 'rect', x: 0, y: 0, width: 10, height: 10, label: 'Wall' }], {
      showLabels: false,
    });
    expect(svg).not.toContain('<text');
  });

  it('draws and escapes the overlay caption', () => {
    const svg = render([], { overlayText: 'Dawn & Dusk' });
    expect(svg).toBe(
      `${OPEN}<text x="600" y="24" fill="#000000" font-size="24" font-family="Arial, sans-serif" text-anchor="middle" dominant-baseline="middle" font-weight="bold">Dawn &amp; Dusk</text></svg>`
    );
  });

  it('skips a blank overlay caption', () => {
    expect(render([], { overlayText: '   ' })).toBe(`${OPEN}</svg>`);
  });

  it('refuses, without markup, a map that does not fit the target table', () => {
    const mapSpec = buildMapSpec(TableSize.massive(), [
      { type: 'rect', x: 0, y: 0, width: 100, height: 100 },
      { type: 'rect', x: 1500, y: 0, width: 200, height: 100 },
    ]);
    const result = renderMapSvg(mapSpec, TableSize.standard());

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(RenderRefusedError);
      expect(result.error.message).toBe(
        'refusing to render: shape at index 1 lies outside the table'
      );
      expect(result).not.toHaveProperty('svg');
    }
  });

  it('uses the map table by default', () => {
    const mapSpec = buildMapSpec(TableSize.massive(), []);
    const result = renderMapSvg(mapSpec);
    expect(result).toEqual({
      ok: true,
      svg: '<svg xmlns="http://www.w3.org/2000/svg" width="1800" height="1200" viewBox="0 0 1800 1200"></svg>',
    });
  });
});
