// src/services/ResultMatrix.ts
import { BillingCell, FieldValue } from '../types/report.types';

export interface PutResult {
  cell: BillingCell;
  /** Populated cell that was overwritten by a different file or different values */
  collision?: BillingCell;
}

/**
 * Cells keyed by (billing month, cycle). Months 1..12 and cycles
 * 1..cyclesPerBillingMonth exist from the start as empty cells; anything else
 * is created on first write. Cells are overwritten, never removed.
 */
export class ResultMatrix {
  private readonly cells = new Map<string, BillingCell>();

  constructor(
    private readonly fieldCount: number,
    private readonly cyclesPerBillingMonth: number
  ) {
    this.initialize();
  }

  initialize(): void {
    this.cells.clear();
    for (let month = 1; month <= 12; month++) {
      for (let cycle = 1; cycle <= this.cyclesPerBillingMonth; cycle++) {
        this.cells.set(cellKey(month, cycle), this.emptyCell(month, cycle));
      }
    }
  }

  get(billingMonth: number, cycle: number): BillingCell {
    assertCoordinate('billingMonth', billingMonth);
    assertCoordinate('cycle', cycle);
    return this.cells.get(cellKey(billingMonth, cycle)) ?? this.emptyCell(billingMonth, cycle);
  }

  put(billingMonth: number, cycle: number, fieldValues: FieldValue[], sourceFile?: string): PutResult {
    assertCoordinate('billingMonth', billingMonth);
    assertCoordinate('cycle', cycle);
    if (fieldValues.length !== this.fieldCount) {
      throw new RangeError(`Expected ${this.fieldCount} field values, got ${fieldValues.length}`);
    }

    const key = cellKey(billingMonth, cycle);
    const existing = this.cells.get(key);
    let collision: BillingCell | undefined;
    if (existing?.hasData) {
      const sameWrite = existing.sourceFile === sourceFile && sameValues(existing.fieldValues, fieldValues);
      if (!sameWrite) {
        collision = { ...existing, fieldValues: [...existing.fieldValues] };
      }
    }

    const cell: BillingCell = existing ?? this.emptyCell(billingMonth, cycle);
    cell.cycle = cycle;
    cell.fieldValues = [...fieldValues];
    cell.hasData = true;
    cell.sourceFile = sourceFile;
    this.cells.set(key, cell);

    return { cell, collision };
  }

  /**
   * Billing months holding at least one populated cell, ascending
   */
  monthsWithData(): number[] {
    const months = new Set<number>();
    for (const cell of this.cells.values()) {
      if (cell.hasData) months.add(cell.billingMonth);
    }
    return [...months].sort((a, b) => a - b);
  }

  populatedCells(): BillingCell[] {
    return [...this.cells.values()]
      .filter(cell => cell.hasData)
      .sort((a, b) => a.billingMonth - b.billingMonth || a.cycle - b.cycle);
  }

  get cycles(): number {
    return this.cyclesPerBillingMonth;
  }

  private emptyCell(billingMonth: number, cycle: number): BillingCell {
    return {
      billingMonth,
      cycle,
      fieldValues: [],
      hasData: false
    };
  }
}

function cellKey(billingMonth: number, cycle: number): string {
  return `${billingMonth}:${cycle}`;
}

function assertCoordinate(name: string, value: number): void {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${name} must be an integer, got ${value}`);
  }
}

function sameValues(a: FieldValue[], b: FieldValue[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}
