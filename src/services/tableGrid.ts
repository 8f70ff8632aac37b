import type { Alignment } from "./noteModel";

export type SpanCell = {
  rowSpan: number;
  colSpan: number;
  align?: Alignment;
};

export type SlotOwner = { row: number; column: number };

export type GridSlot<T> =
  | { kind: "cell"; cell: T; rowSpan: number; colSpan: number }
  | { kind: "continuation"; owner: SlotOwner }
  | { kind: "empty" };

export type SpanOverflow = {
  row: number;
  column: number;
  axis: "row" | "column";
  declared: number;
  applied: number;
};

export type Grid<T> = {
  grid: GridSlot<T>[][];
  columns: number;
  alignments: Array<Alignment | null>;
  overflows: SpanOverflow[];
};

const freeRun = <T>(
  slots: Array<Array<GridSlot<T> | undefined>>,
  row: number,
  rowSpan: number,
  column: number,
  limit: number
) => {
  let width = 0;
  while (width < limit) {
    const c = column + width;
    let free = true;
    for (let r = row; r < row + rowSpan; r += 1) {
      if (slots[r][c] !== undefined) {
        free = false;
        break;
      }
    }
    if (!free) break;
    width += 1;
  }
  return width;
};

const freeDepth = <T>(slots: Array<Array<GridSlot<T> | undefined>>, row: number, column: number, limit: number) => {
  let depth = 0;
  while (depth < limit && slots[row + depth][column] === undefined) depth += 1;
  return depth;
};

// Spans are clamped to the rows below and to the first occupied column.
export const buildGrid = <T extends SpanCell>(rows: ReadonlyArray<ReadonlyArray<T>>): Grid<T> => {
  const rowCount = rows.length;
  const slots: Array<Array<GridSlot<T> | undefined>> = rows.map(() => []);
  const overflows: SpanOverflow[] = [];

  rows.forEach((cells, r) => {
    let column = 0;
    cells.forEach((cell) => {
      while (slots[r][column] !== undefined) column += 1;
      const declaredRows = Math.max(1, Math.floor(cell.rowSpan));
      const declaredColumns = Math.max(1, Math.floor(cell.colSpan));

      let rowSpan = Math.min(declaredRows, rowCount - r);
      let colSpan = freeRun(slots, r, rowSpan, column, declaredColumns);
      if (colSpan === 0) {
        rowSpan = freeDepth(slots, r, column, rowSpan);
        colSpan = freeRun(slots, r, rowSpan, column, declaredColumns);
      }
      if (rowSpan < declaredRows) {
        overflows.push({ row: r, column, axis: "row", declared: declaredRows, applied: rowSpan });
      }
      if (colSpan < declaredColumns) {
        overflows.push({ row: r, column, axis: "column", declared: declaredColumns, applied: colSpan });
      }

      for (let dr = 0; dr < rowSpan; dr += 1) {
        for (let dc = 0; dc < colSpan; dc += 1) {
          slots[r + dr][column + dc] =
            dr === 0 && dc === 0
              ? { kind: "cell", cell, rowSpan, colSpan }
              : { kind: "continuation", owner: { row: r, column } };
        }
      }
      column += colSpan;
    });
  });

  const columns = slots.reduce((max, row) => Math.max(max, row.length), 0);
  const grid: GridSlot<T>[][] = slots.map((row) =>
    Array.from({ length: columns }, (_, c): GridSlot<T> => row[c] ?? { kind: "empty" })
  );

  const alignments: Array<Alignment | null> = Array.from({ length: columns }, (_, c) => {
    for (const row of grid) {
      const slot = row[c];
      if (slot.kind === "cell" && slot.cell.align) return slot.cell.align;
    }
    return null;
  });

  return { grid, columns, alignments, overflows };
};

export const flattenGrid = <T>(grid: GridSlot<T>[][], renderCell: (cell: T) => string) =>
  grid.map((row) =>
    row.map((slot) => (slot.kind === "cell" ? renderCell(slot.cell).replace(/\r?\n/g, "<br>") : ""))
  );

const separatorFor = (alignment: Alignment | null) => {
  switch (alignment) {
    case "left":
      return ":--";
    case "center":
      return ":-:";
    case "right":
      return "--:";
    default:
      return "---";
  }
};

const rowLine = (cells: string[]) => `| ${cells.join(" | ")} |`;

export const renderTable = <T extends SpanCell>(
  rows: ReadonlyArray<ReadonlyArray<T>>,
  renderCell: (cell: T) => string
) => {
  const result = buildGrid(rows);
  if (result.columns === 0) return { lines: [], overflows: result.overflows };
  const [header, ...body] = flattenGrid(result.grid, renderCell);
  const lines = [
    rowLine(header),
    rowLine(result.alignments.map(separatorFor)),
    ...body.map(rowLine),
  ];
  return { lines, overflows: result.overflows };
};
