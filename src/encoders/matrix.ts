/**
 * Row-major 2-D numeric arrays returned by the encoders.
 */
export interface Matrix<T extends Float32Array | Int32Array> {
    readonly shape: readonly [rows: number, columns: number];
    readonly data: T;
}

export type CountMatrix = Matrix<Float32Array>;
export type PositionIndex = Matrix<Int32Array>;

export function matrixRow<T extends Float32Array | Int32Array>(matrix: Matrix<T>, row: number): number[] {
    const [rows, columns] = matrix.shape;
    if (!Number.isInteger(row) || row < 0 || row >= rows) {
        throw new RangeError(`Row ${row} out of range [0, ${rows})`);
    }
    return Array.from(matrix.data.subarray(row * columns, (row + 1) * columns));
}

export function toNestedArray<T extends Float32Array | Int32Array>(matrix: Matrix<T>): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < matrix.shape[0]; row++) {
        rows.push(matrixRow(matrix, row));
    }
    return rows;
}
