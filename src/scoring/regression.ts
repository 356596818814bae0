// src/scoring/regression.ts

/**
 * Ridge regression on standardized features
 *
 * Small dense problems only (a handful of features), solved directly through
 * the normal equations: (XᵀX + λI) w = Xᵀ(y - ȳ).
 */

export interface RidgeParams {
    means: number[];
    scales: number[];
    coefficients: number[];
    intercept: number;
}

const PIVOT_EPSILON = 1e-12;

function mean(values: readonly number[]): number {
    return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/**
 * Solve A x = b by Gaussian elimination with partial pivoting.
 * Variables whose pivot vanishes are set to 0.
 */
export function solveLinearSystem(a: readonly number[][], b: readonly number[]): number[] {
    const n = b.length;
    const m = a.map((row, i) => [...row, b[i]]);

    for (let col = 0; col < n; col++) {
        let pivotRow = col;
        for (let row = col + 1; row < n; row++) {
            if (Math.abs(m[row][col]) > Math.abs(m[pivotRow][col])) {
                pivotRow = row;
            }
        }
        [m[col], m[pivotRow]] = [m[pivotRow], m[col]];

        const pivot = m[col][col];
        if (Math.abs(pivot) < PIVOT_EPSILON) {
            continue;
        }

        for (let row = 0; row < n; row++) {
            if (row === col) {
                continue;
            }
            const factor = m[row][col] / pivot;
            if (factor === 0) {
                continue;
            }
            for (let k = col; k <= n; k++) {
                m[row][k] -= factor * m[col][k];
            }
        }
    }

    return m.map((row, i) => (Math.abs(row[i]) < PIVOT_EPSILON ? 0 : row[n] / row[i]));
}

/**
 * Fit ridge regression
 *
 * @param features Rows of equal length
 * @param targets One target per row
 * @param lambda Regularization strength, >= 0
 */
export function fitRidge(features: readonly number[][], targets: readonly number[], lambda: number): RidgeParams {
    if (features.length === 0 || features.length !== targets.length) {
        throw new Error(`Cannot fit on ${features.length} rows and ${targets.length} targets`);
    }

    const width = features[0].length;
    const means: number[] = [];
    const scales: number[] = [];

    for (let j = 0; j < width; j++) {
        const column = features.map(row => row[j]);
        const mu = mean(column);
        const variance = mean(column.map(v => (v - mu) ** 2));
        means.push(mu);
        // Constant columns standardize to all zeros
        scales.push(variance > 0 ? Math.sqrt(variance) : 1);
    }

    const standardized = features.map(row => row.map((v, j) => (v - means[j]) / scales[j]));
    const yMean = mean(targets);
    const centered = targets.map(t => t - yMean);

    const gram: number[][] = [];
    const moment: number[] = [];
    for (let i = 0; i < width; i++) {
        gram.push(new Array<number>(width).fill(0));
        moment.push(0);
    }

    standardized.forEach((row, r) => {
        for (let i = 0; i < width; i++) {
            moment[i] += row[i] * centered[r];
            for (let j = 0; j < width; j++) {
                gram[i][j] += row[i] * row[j];
            }
        }
    });

    for (let i = 0; i < width; i++) {
        gram[i][i] += lambda;
    }

    return {
        means,
        scales,
        coefficients: solveLinearSystem(gram, moment),
        intercept: yMean
    };
}

export function predictRidge(params: RidgeParams, row: readonly number[]): number {
    let prediction = params.intercept;
    for (let j = 0; j < params.coefficients.length; j++) {
        prediction += params.coefficients[j] * ((row[j] - params.means[j]) / params.scales[j]);
    }
    return prediction;
}

/**
 * Coefficient of determination, null when the targets have no variance
 */
export function rSquared(actual: readonly number[], predicted: readonly number[]): number | null {
    const mu = mean(actual);
    let residual = 0;
    let total = 0;
    for (let i = 0; i < actual.length; i++) {
        residual += (actual[i] - predicted[i]) ** 2;
        total += (actual[i] - mu) ** 2;
    }
    return total === 0 ? null : 1 - residual / total;
}

/**
 * Mean R² over k folds; row i is held out in fold i % k.
 *
 * @returns null when fewer than two folds fit or no fold has target variance
 */
export function crossValidateR2(
    features: readonly number[][],
    targets: readonly number[],
    folds: number,
    lambda: number
): number | null {
    const k = Math.min(folds, features.length);
    if (k < 2) {
        return null;
    }

    const scores: number[] = [];
    for (let fold = 0; fold < k; fold++) {
        const trainX: number[][] = [];
        const trainY: number[] = [];
        const testX: number[][] = [];
        const testY: number[] = [];

        features.forEach((row, i) => {
            if (i % k === fold) {
                testX.push(row);
                testY.push(targets[i]);
            } else {
                trainX.push(row);
                trainY.push(targets[i]);
            }
        });

        const params = fitRidge(trainX, trainY, lambda);
        const score = rSquared(testY, testX.map(row => predictRidge(params, row)));
        if (score !== null) {
            scores.push(score);
        }
    }

    return scores.length > 0 ? mean(scores) : null;
}

/**
 * Share of each standardized coefficient's magnitude, summing to 1
 * (all zeros when every coefficient is zero)
 */
export function featureImportances(params: RidgeParams): number[] {
    const magnitudes = params.coefficients.map(Math.abs);
    const total = magnitudes.reduce((sum, v) => sum + v, 0);
    return magnitudes.map(v => (total === 0 ? 0 : v / total));
}
