import { describe, expect, test } from 'vitest';
import { EditorDocument } from '../core/document/document';
import { Viewport } from '../core/viewport/viewport-manager';

function numberedDoc(count: number): EditorDocument {
  const lines: string[] = [];
  for (let i = 0; i < count; i++) lines.push(`row ${i}`);
  return EditorDocument.fromText(lines.join('\n'));
}

describe('Viewport', () => {
  test('scrolls down just enough to show the cursor', () => {
    const doc = numberedDoc(10);
    const viewport = new Viewport(3, 5);
    viewport.recompute({ row: 5, column: 0 }, doc);
    expect(viewport.rowOffset).toBe(3);
    expect(viewport.getVisibleRange()).toEqual({ startRow: 3, endRow: 6 });
  });

  test('scrolls up to the cursor row', () => {
    const doc = numberedDoc(10);
    const viewport = new Viewport(3, 5);
    viewport.rowOffset = 6;
    viewport.recompute({ row: 1, column: 0 }, doc);
    expect(viewport.rowOffset).toBe(1);
  });

  test('does not move while the cursor is visible', () => {
    const doc = numberedDoc(10);
    const viewport = new Viewport(3, 5);
    viewport.rowOffset = 2;
    viewport.recompute({ row: 4, column: 0 }, doc);
    expect(viewport.rowOffset).toBe(2);
  });

  test('horizontal scroll follows the display column', () => {
    const doc = EditorDocument.fromText('\tabcdef\n');
    const viewport = new Viewport(3, 5);
    expect(viewport.recompute({ row: 0, column: 1 }, doc)).toBe(8);
    expect(viewport.colOffset).toBe(4);
    expect(viewport.recompute({ row: 0, column: 0 }, doc)).toBe(0);
    expect(viewport.colOffset).toBe(0);
  });

  test('the line past the end has display column 0', () => {
    const doc = numberedDoc(2);
    const viewport = new Viewport(3, 5);
    expect(viewport.recompute({ row: 2, column: 0 }, doc)).toBe(0);
  });

  test('resize keeps at least one row and column', () => {
    const viewport = new Viewport(10, 10);
    viewport.resize(0, -2);
    expect(viewport.visibleRows).toBe(1);
    expect(viewport.visibleCols).toBe(1);
  });

  test('position and restore', () => {
    const viewport = new Viewport(3, 5);
    viewport.rowOffset = 4;
    viewport.colOffset = 2;
    const saved = viewport.position;
    viewport.restore({ rowOffset: 0, colOffset: 0 });
    viewport.restore(saved);
    expect(viewport.position).toEqual({ rowOffset: 4, colOffset: 2 });
  });
});
