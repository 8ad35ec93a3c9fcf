import { IHaveDebugStr } from '../debug';

export interface ConstTable<D> extends IHaveDebugStr {
  readonly numRows: number;
  readonly numCols: number;
  getCell(row: number, col: number): D;
  getRow(row: number): readonly D[];
}

/**
 * A dense two dimensional table. Rows can be added after construction,
 * but the number of columns is fixed.
 */
export class Table<D> implements ConstTable<D> {
  private rows: D[][] = [];
  private readonly _numCols: number;

  constructor(numCols: number) {
    this._numCols = numCols;
  }

  get numRows() {
    return this.rows.length;
  }
  get numCols() {
    return this._numCols;
  }

  static init<D>(numRows: number, numCols: number, value: () => D) {
    let table: Table<D> = new Table(numCols);
    for (let row = 0; row < numRows; row++) {
      table.addRow(value);
    }
    return table;
  }

  /**
   * Add a row to the table where each cell in the row has the given
   * value.
   *
   * @returns the index of the new row
   */
  addRow(value: () => D): number {
    let cols: D[] = [];
    for (let c = 0; c < this._numCols; c++) {
      cols.push(value());
    }
    this.rows.push(cols);
    return this.rows.length - 1;
  }

  /**
   * Set the value of the cell at the given row/col to the given value.
   */
  setCell(row: number, col: number, value: D) {
    if (row < 0 || row >= this.rows.length) {
      throw new Error(
        `TableIndexError: Invalid row ${row}. Must be between 0 and ${this.rows.length} exclusive`
      );
    }
    if (col < 0 || col >= this._numCols) {
      throw new Error(
        `TableIndexError: Invalid col ${col}. Must be between 0 and ${this._numCols} exclusive`
      );
    }
    this.rows[row][col] = value;
  }

  getCell(row: number, col: number): D {
    return this.rows[row][col];
  }

  getRow(row: number): readonly D[] {
    return this.rows[row];
  }

  /**
   * return a debug string for the table, with every column right
   * aligned to its widest cell.
   */
  toDebugStr() {
    let out = '';
    let minWidths: number[] = [];
    for (let ci = 0; ci < this.numCols; ci++) {
      let minWidth = 1;
      for (let ri = 0; ri < this.numRows; ri++) {
        minWidth = Math.max(minWidth, `${this.getCell(ri, ci)}`.length);
      }
      minWidths.push(minWidth);
    }

    for (let row = 0; row < this.numRows; row++) {
      for (let col = 0; col < this.numCols; col++) {
        out += `${this.getCell(row, col)}`.padStart(minWidths[col] + 2);
      }
      out += '\n';
    }
    return out;
  }
}
