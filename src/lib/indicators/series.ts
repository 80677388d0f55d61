// ============================================================
// O(n) Series Computation
// ============================================================
// Every function returns a series aligned to its input: index i holds
// the value as of bar i, and bars before the lookback hold null.
// ============================================================

type Series = (number | null)[];

/**
 * Front-pad a tail-aligned array of values to `total` entries
 */
export function padSeries(values: number[], total: number): Series {
  const missing = total - values.length;
  const out: Series = new Array<number | null>(Math.max(missing, 0)).fill(null);
  for (const v of values) out.push(v);
  return out;
}

export function calculateTrueRange(high: number, low: number, prevClose: number): number {
  return Math.max(high - low, Math.abs(high - prevClose), Math.abs(low - prevClose));
}

/** SMA: sliding window sum */
export function smaSeries(data: number[], period: number): Series {
  if (data.length < period) return padSeries([], data.length);

  const results: number[] = [];
  let sum = 0;
  for (let i = 0; i < period; i++) sum += data[i];
  results.push(sum / period);

  for (let i = period; i < data.length; i++) {
    sum += data[i] - data[i - period];
    results.push(sum / period);
  }

  return padSeries(results, data.length);
}

/** EMA values, seeded with the SMA of the first period */
function emaValues(data: number[], period: number): number[] {
  if (data.length < period) return [];

  const results: number[] = [];
  const multiplier = 2 / (period + 1);

  let sum = 0;
  for (let i = 0; i < period; i++) sum += data[i];
  let ema = sum / period;
  results.push(ema);

  for (let i = period; i < data.length; i++) {
    ema = (data[i] - ema) * multiplier + ema;
    results.push(ema);
  }

  return results;
}

export function emaSeries(data: number[], period: number): Series {
  return padSeries(emaValues(data, period), data.length);
}

/** RSI with Wilder smoothing */
export function rsiSeries(data: number[], period: number): Series {
  if (data.length < period + 1) return padSeries([], data.length);

  const results: number[] = [];
  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 1; i <= period; i++) {
    const change = data[i] - data[i - 1];
    if (change > 0) avgGain += change;
    else avgLoss -= change;
  }
  avgGain /= period;
  avgLoss /= period;

  const rsi = (): number => (avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss));
  results.push(rsi());

  for (let i = period + 1; i < data.length; i++) {
    const change = data[i] - data[i - 1];
    avgGain = (avgGain * (period - 1) + Math.max(change, 0)) / period;
    avgLoss = (avgLoss * (period - 1) + Math.max(-change, 0)) / period;
    results.push(rsi());
  }

  return padSeries(results, data.length);
}

export interface BollingerSeries {
  upper: Series;
  middle: Series;
  lower: Series;
  width: Series;
  percent_b: Series;
}

/** Bollinger Bands with population standard deviation */
export function bollingerSeries(data: number[], period: number, stdDevMult: number): BollingerSeries {
  const upper: number[] = [];
  const middle: number[] = [];
  const lower: number[] = [];
  const width: number[] = [];
  const percentB: number[] = [];

  for (let end = period - 1; end < data.length; end++) {
    let sum = 0;
    for (let j = end - period + 1; j <= end; j++) sum += data[j];
    const mid = sum / period;

    let sqDiffSum = 0;
    for (let j = end - period + 1; j <= end; j++) {
      const diff = data[j] - mid;
      sqDiffSum += diff * diff;
    }
    const sd = Math.sqrt(sqDiffSum / period);
    const up = mid + stdDevMult * sd;
    const low = mid - stdDevMult * sd;

    upper.push(up);
    middle.push(mid);
    lower.push(low);
    width.push(mid === 0 ? 0 : (up - low) / mid);
    percentB.push(up === low ? 0.5 : (data[end] - low) / (up - low));
  }

  const n = data.length;
  return {
    upper: padSeries(upper, n),
    middle: padSeries(middle, n),
    lower: padSeries(lower, n),
    width: padSeries(width, n),
    percent_b: padSeries(percentB, n),
  };
}

export interface MACDSeries {
  macd: Series;
  signal: Series;
  histogram: Series;
}

/** MACD line, its signal EMA and the histogram */
export function macdSeries(
  data: number[],
  fastPeriod: number,
  slowPeriod: number,
  signalPeriod: number,
): MACDSeries {
  const n = data.length;
  const empty: MACDSeries = { macd: padSeries([], n), signal: padSeries([], n), histogram: padSeries([], n) };
  if (n < slowPeriod + signalPeriod) return empty;

  const fastEMAs = emaValues(data, fastPeriod);
  const slowEMAs = emaValues(data, slowPeriod);

  // align the fast EMA to the slow one
  const offset = slowPeriod - fastPeriod;
  const macdLine: number[] = [];
  for (let i = 0; i < slowEMAs.length; i++) {
    macdLine.push(fastEMAs[i + offset] - slowEMAs[i]);
  }

  const signalEMAs = emaValues(macdLine, signalPeriod);

  // skip the SMA seed of the signal line
  const macd: number[] = [];
  const signal: number[] = [];
  const histogram: number[] = [];
  for (let i = 1; i < signalEMAs.length; i++) {
    const macdVal = macdLine[i + signalPeriod - 1];
    macd.push(macdVal);
    signal.push(signalEMAs[i]);
    histogram.push(macdVal - signalEMAs[i]);
  }

  return {
    macd: padSeries(macd, n),
    signal: padSeries(signal, n),
    histogram: padSeries(histogram, n),
  };
}

export interface StochasticSeries {
  k: Series;
  d: Series;
}

export function stochasticSeries(
  highs: number[],
  lows: number[],
  closes: number[],
  kPeriod: number,
  dPeriod: number,
): StochasticSeries {
  const n = closes.length;
  const kValues: number[] = [];
  for (let i = kPeriod - 1; i < n; i++) {
    let hh = -Infinity;
    let ll = Infinity;
    for (let j = i - kPeriod + 1; j <= i; j++) {
      if (highs[j] > hh) hh = highs[j];
      if (lows[j] < ll) ll = lows[j];
    }
    const range = hh - ll;
    kValues.push(range === 0 ? 50 : ((closes[i] - ll) / range) * 100);
  }

  const k: number[] = [];
  const d: number[] = [];
  for (let i = dPeriod - 1; i < kValues.length; i++) {
    let dSum = 0;
    for (let j = i - dPeriod + 1; j <= i; j++) dSum += kValues[j];
    k.push(kValues[i]);
    d.push(dSum / dPeriod);
  }

  return { k: padSeries(k, n), d: padSeries(d, n) };
}

/** ATR with Wilder smoothing */
export function atrSeries(highs: number[], lows: number[], closes: number[], period: number): Series {
  const n = closes.length;
  if (n < period + 1) return padSeries([], n);

  const trValues: number[] = [];
  for (let i = 1; i < n; i++) {
    trValues.push(calculateTrueRange(highs[i], lows[i], closes[i - 1]));
  }

  const results: number[] = [];
  let atr = 0;
  for (let i = 0; i < period; i++) atr += trValues[i];
  atr /= period;
  results.push(atr);

  for (let i = period; i < trValues.length; i++) {
    atr = (atr * (period - 1) + trValues[i]) / period;
    results.push(atr);
  }

  return padSeries(results, n);
}

export interface ADXSeries {
  value: Series;
  plus_di: Series;
  minus_di: Series;
}

/**
 * ADX with Wilder smoothing.
 * +DI/-DI start at bar `period`, ADX (the average of the first `period`
 * DX values) at bar `2 * period - 1`.
 */
export function adxSeries(highs: number[], lows: number[], closes: number[], period: number): ADXSeries {
  const n = closes.length;
  const plusDI: number[] = [];
  const minusDI: number[] = [];
  const adx: number[] = [];

  if (n >= period + 1) {
    let smoothedPlusDM = 0;
    let smoothedMinusDM = 0;
    let smoothedTR = 0;
    const dxValues: number[] = [];
    let adxValue = 0;

    for (let i = 1; i < n; i++) {
      const upMove = highs[i] - highs[i - 1];
      const downMove = lows[i - 1] - lows[i];
      const plusDM = upMove > downMove && upMove > 0 ? upMove : 0;
      const minusDM = downMove > upMove && downMove > 0 ? downMove : 0;
      const tr = calculateTrueRange(highs[i], lows[i], closes[i - 1]);

      if (i <= period) {
        smoothedPlusDM += plusDM;
        smoothedMinusDM += minusDM;
        smoothedTR += tr;
        if (i < period) continue;
      } else {
        smoothedPlusDM = smoothedPlusDM - smoothedPlusDM / period + plusDM;
        smoothedMinusDM = smoothedMinusDM - smoothedMinusDM / period + minusDM;
        smoothedTR = smoothedTR - smoothedTR / period + tr;
      }

      const pdi = smoothedTR === 0 ? 0 : (smoothedPlusDM / smoothedTR) * 100;
      const mdi = smoothedTR === 0 ? 0 : (smoothedMinusDM / smoothedTR) * 100;
      plusDI.push(pdi);
      minusDI.push(mdi);

      const diSum = pdi + mdi;
      const dx = diSum === 0 ? 0 : (Math.abs(pdi - mdi) / diSum) * 100;
      dxValues.push(dx);

      if (dxValues.length === period) {
        adxValue = dxValues.reduce((a, b) => a + b, 0) / period;
        adx.push(adxValue);
      } else if (dxValues.length > period) {
        adxValue = (adxValue * (period - 1) + dx) / period;
        adx.push(adxValue);
      }
    }
  }

  return {
    value: padSeries(adx, n),
    plus_di: padSeries(plusDI, n),
    minus_di: padSeries(minusDI, n),
  };
}

/** CCI over the typical price */
export function cciSeries(highs: number[], lows: number[], closes: number[], period: number): Series {
  const n = closes.length;
  const results: number[] = [];

  for (let end = period - 1; end < n; end++) {
    const typicalPrices: number[] = [];
    for (let j = end - period + 1; j <= end; j++) {
      typicalPrices.push((highs[j] + lows[j] + closes[j]) / 3);
    }

    const smaTP = typicalPrices.reduce((sum, tp) => sum + tp, 0) / period;
    const meanDeviation = typicalPrices.reduce((sum, tp) => sum + Math.abs(tp - smaTP), 0) / period;
    const currentTP = typicalPrices[typicalPrices.length - 1];

    results.push(meanDeviation === 0 ? 0 : (currentTP - smaTP) / (0.015 * meanDeviation));
  }

  return padSeries(results, n);
}

/** Williams %R, -100..0 */
export function williamsRSeries(highs: number[], lows: number[], closes: number[], period: number): Series {
  const n = closes.length;
  const results: number[] = [];

  for (let i = period - 1; i < n; i++) {
    let hh = -Infinity;
    let ll = Infinity;
    for (let j = i - period + 1; j <= i; j++) {
      if (highs[j] > hh) hh = highs[j];
      if (lows[j] < ll) ll = lows[j];
    }
    const range = hh - ll;
    results.push(range === 0 ? -50 : ((hh - closes[i]) / range) * -100);
  }

  return padSeries(results, n);
}

/** Cumulative VWAP; null until some volume has traded */
export function vwapSeries(highs: number[], lows: number[], closes: number[], volumes: number[]): Series {
  const out: Series = [];
  let cumulativeTPV = 0;
  let cumulativeVolume = 0;

  for (let i = 0; i < closes.length; i++) {
    const typicalPrice = (highs[i] + lows[i] + closes[i]) / 3;
    cumulativeTPV += typicalPrice * volumes[i];
    cumulativeVolume += volumes[i];
    out.push(cumulativeVolume > 0 ? cumulativeTPV / cumulativeVolume : null);
  }

  return out;
}

/**
 * Choppiness index, 0..100. High values mean sideways markets.
 * A window with no range counts as fully choppy.
 */
export function choppinessSeries(highs: number[], lows: number[], closes: number[], period: number): Series {
  const n = closes.length;
  const results: number[] = [];
  if (n < period + 1) return padSeries(results, n);

  const trValues: number[] = [0];
  for (let i = 1; i < n; i++) {
    trValues.push(calculateTrueRange(highs[i], lows[i], closes[i - 1]));
  }

  for (let end = period; end < n; end++) {
    let trSum = 0;
    let hh = -Infinity;
    let ll = Infinity;
    for (let j = end - period + 1; j <= end; j++) {
      trSum += trValues[j];
      if (highs[j] > hh) hh = highs[j];
      if (lows[j] < ll) ll = lows[j];
    }
    const range = hh - ll;
    results.push(range === 0 ? 100 : (100 * Math.log10(trSum / range)) / Math.log10(period));
  }

  return padSeries(results, n);
}

/** Current volume over its SMA, 0 when the window has no volume */
export function volumeRatioSeries(volumes: number[], period: number): Series {
  const averages = smaSeries(volumes, period);
  return averages.map((avg, i) => {
    if (avg === null) return null;
    return avg === 0 ? 0 : volumes[i] / avg;
  });
}

/** Percent change of close over `period` bars */
export function priceChangeSeries(closes: number[], period: number): Series {
  return closes.map((close, i) => {
    if (i < period) return null;
    const prior = closes[i - period];
    return prior === 0 ? 0 : ((close - prior) / prior) * 100;
  });
}
