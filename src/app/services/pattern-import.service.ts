import { Injectable } from '@angular/core';
import type { Cell, LifePattern } from '../model/life';
import { OutOfBoundsError, PatternFormatError } from '../model/life-errors';

export interface ParsedPattern {
  name: string;
  cells: Cell[];
  width: number;
  height: number;
}

/**
 * Reads Life pattern text in RLE, plaintext (`.`/`O`) or `x,y` coordinate-list
 * form and turns it into cells an engine can be seeded with.
 */
@Injectable({ providedIn: 'root' })
export class PatternImportService {
  parse(input: string, fallbackName = 'Imported Pattern'): ParsedPattern {
    const raw = input.trim();
    if (!raw) {
      throw new PatternFormatError('Pattern text is empty.');
    }

    const parsedRle = this.tryParseRle(raw, fallbackName);
    if (parsedRle) return parsedRle;

    const parsedPlaintext = this.tryParsePlaintext(raw, fallbackName);
    if (parsedPlaintext) return parsedPlaintext;

    const parsedCoords = this.tryParseCoordinateList(raw, fallbackName);
    if (parsedCoords) return parsedCoords;

    throw new PatternFormatError('Unsupported pattern format. Use RLE, plaintext or one x,y pair per line.');
  }

  toPattern(parsed: ParsedPattern): LifePattern {
    const pattern: LifePattern = Array.from({ length: parsed.height }, () =>
      new Array<boolean>(parsed.width).fill(false)
    );
    for (const cell of parsed.cells) {
      pattern[cell.y][cell.x] = true;
    }
    return pattern;
  }

  /** Shifts the pattern by `offset`; every live cell must land inside the grid. */
  placeOnGrid(parsed: ParsedPattern, cols: number, rows: number, offset: Cell = { x: 0, y: 0 }): Cell[] {
    return parsed.cells.map(cell => {
      const x = cell.x + offset.x;
      const y = cell.y + offset.y;
      if (x < 0 || y < 0 || x >= cols || y >= rows) {
        throw new OutOfBoundsError(x, y, cols, rows);
      }
      return { x, y };
    });
  }

  private tryParseRle(raw: string, fallbackName: string): ParsedPattern | null {
    const lines = splitLines(raw);
    const comments = lines.filter(line => line.startsWith('#'));
    const dataLines = lines.filter(line => line && !line.startsWith('#'));

    const header = dataLines.find(line => /^x\s*=/.test(line));
    if (!header) return null;

    const body = dataLines.filter(line => line !== header).join('');
    if (!body.includes('!')) {
      throw new PatternFormatError('Invalid RLE: missing ! terminator.');
    }

    const headerMatch = header.match(/x\s*=\s*(\d+)\s*,\s*y\s*=\s*(\d+)/i);
    const declaredWidth = headerMatch ? Number(headerMatch[1]) : 0;
    const declaredHeight = headerMatch ? Number(headerMatch[2]) : 0;

    let x = 0;
    let y = 0;
    let run = '';
    const cells: Cell[] = [];
    for (const ch of body) {
      if (/\d/.test(ch)) {
        run += ch;
        continue;
      }
      if (ch === '!') break;
      if (/\s/.test(ch)) continue;

      const count = run ? Number(run) : 1;
      run = '';
      if (ch === 'o') {
        for (let i = 0; i < count; i++) {
          cells.push({ x: x + i, y });
        }
        x += count;
      } else if (ch === 'b') {
        x += count;
      } else if (ch === '$') {
        y += count;
        x = 0;
      } else {
        throw new PatternFormatError(`Invalid RLE: unexpected token "${ch}".`);
      }
    }

    const nameLine = comments.find(line => /^#N\s+/i.test(line));
    const name = nameLine ? nameLine.replace(/^#N\s+/i, '').trim() : '';
    const bounds = computeBounds(cells);
    return {
      name: name || fallbackName,
      cells: normalizeCells(cells),
      width: Math.max(declaredWidth, bounds.width),
      height: Math.max(declaredHeight, bounds.height)
    };
  }

  private tryParsePlaintext(raw: string, fallbackName: string): ParsedPattern | null {
    const lines = splitLines(raw);
    const comments = lines.filter(line => line.startsWith('!'));
    const dataLines = lines.filter(line => !line.startsWith('!'));
    if (!dataLines.length || !dataLines.every(line => /^[.O*]*$/.test(line))) return null;

    const cells: Cell[] = [];
    dataLines.forEach((line, y) => {
      [...line].forEach((ch, x) => {
        if (ch !== '.') cells.push({ x, y });
      });
    });

    const nameLine = comments.find(line => /^!Name:/i.test(line));
    const name = nameLine ? nameLine.replace(/^!Name:/i, '').trim() : '';
    return {
      name: name || fallbackName,
      cells,
      width: dataLines.reduce((widest, line) => Math.max(widest, line.length), 0),
      height: dataLines.length
    };
  }

  private tryParseCoordinateList(raw: string, fallbackName: string): ParsedPattern | null {
    const cells: Cell[] = [];
    for (const line of splitLines(raw)) {
      if (!line || line.startsWith('#')) continue;
      const match = line.match(/^(\d+)\s*[, ]\s*(\d+)$/);
      if (!match) return null;
      cells.push({ x: Number(match[1]), y: Number(match[2]) });
    }
    if (!cells.length) return null;

    const normalized = normalizeCells(cells);
    const bounds = computeBounds(normalized);
    return {
      name: fallbackName,
      cells: normalized,
      width: bounds.width,
      height: bounds.height
    };
  }
}

function splitLines(raw: string) {
  return raw
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map(line => line.trim());
}

function normalizeCells(cells: Cell[]) {
  const seen = new Set<string>();
  const out: Cell[] = [];
  for (const cell of cells) {
    const key = `${cell.x},${cell.y}`;
    if (seen.has(key)) continue;
    seen.add(key);
    out.push(cell);
  }
  return out;
}

// Extent measured from the origin, since pattern coordinates are never negative.
function computeBounds(cells: Cell[]) {
  let width = 0;
  let height = 0;
  for (const cell of cells) {
    width = Math.max(width, cell.x + 1);
    height = Math.max(height, cell.y + 1);
  }
  return { width, height };
}
