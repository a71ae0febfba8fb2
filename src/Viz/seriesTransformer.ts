import type {
    ForecastSet,
    LineDrawable,
    ModelForecast,
    PolygonDrawable,
    TruthSeries,
} from "../types/vizTypes";
import { compareDates } from "../Utils/dateUtils";

export const MEDIAN_KEY = "q0.5";
export const INTERVAL_OPACITY = 0.3;

export class SeriesDataError extends Error {
    model?: string;

    constructor(message: string, model?: string) {
        super(message);
        this.name = "SeriesDataError";
        this.model = model;
    }
}

export type ModelDrawables = {
    leadInLine: LineDrawable;
    medianLine: LineDrawable;
    intervalPolygon: PolygonDrawable | null;
};

export type DrawContext = {
    interval: string;
    color: string;
    asOfTruth: TruthSeries | null;
    showMarkers: boolean;
};

function quantileKey(probability: number): string {
    return `q${Number(probability.toFixed(6))}`;
}

/**
 * Maps an interval label to its (lower, upper) quantile keys: "50%" gives
 * ["q0.25", "q0.75"], "95%" gives ["q0.025", "q0.975"]. "0%" has no interval.
 */
export function intervalQuantileKeys(interval: string): [string, string] | null {
    const match = /^(\d+(?:\.\d+)?)%$/.exec(interval);
    if (!match) {
        throw new SeriesDataError(`Unknown interval: ${interval}`);
    }
    const width = Number(match[1]);
    if (width === 0) return null;
    if (width > 100) {
        throw new SeriesDataError(`Interval wider than 100%: ${interval}`);
    }
    return [quantileKey((100 - width) / 200), quantileKey((100 + width) / 200)];
}

/**
 * Returns a copy of `forecast` with every array reordered by calendar date.
 * The input is left untouched.
 */
export function sortModelForecast(forecast: ModelForecast): ModelForecast {
    const order = forecast.target_end_date
        .map((date, index) => ({ date, index }))
        .sort((a, b) => compareDates(a.date, b.date) || a.index - b.index)
        .map(({ index }) => index);

    const quantiles: Record<string, number[]> = {};
    for (const [key, values] of Object.entries(forecast.quantiles)) {
        quantiles[key] = order.map((i) => values[i]);
    }
    return {
        target_end_date: order.map((i) => forecast.target_end_date[i]),
        quantiles,
    };
}

export function lastTruthPoint(
    truth: TruthSeries | null
): { date: string; y: number } | null {
    if (!truth || truth.date.length === 0) return null;
    const last = truth.date.length - 1;
    return { date: truth.date[last], y: truth.y[last] };
}

function requireQuantile(forecast: ModelForecast, key: string, model: string): number[] {
    const values = forecast.quantiles[key];
    if (!values) {
        throw new SeriesDataError(`Forecast for ${model} has no ${key}`, model);
    }
    return values;
}

/**
 * Builds the lead-in connector, median line and (for non-zero intervals) the
 * interval polygon for one model. Returns null when the model has no
 * forecast rows or is absent from `forecasts`.
 */
export function buildModelDrawables(
    model: string,
    forecasts: ForecastSet,
    context: DrawContext
): ModelDrawables | null {
    const raw = forecasts[model];
    if (!raw || raw.target_end_date.length === 0) return null;

    const forecast = sortModelForecast(raw);
    const dates = forecast.target_end_date;
    const median = requireQuantile(forecast, MEDIAN_KEY, model);
    const truthPoint = lastTruthPoint(context.asOfTruth);

    const leadInLine: LineDrawable = {
        kind: "line",
        name: `${model} lead-in`,
        x: truthPoint ? [truthPoint.date, dates[0]] : [dates[0]],
        y: truthPoint ? [truthPoint.y, median[0]] : [median[0]],
        color: context.color,
        showMarkers: false,
        showLegend: false,
    };

    const medianLine: LineDrawable = {
        kind: "line",
        name: model,
        x: dates,
        y: median,
        color: context.color,
        showMarkers: context.showMarkers,
        showLegend: true,
    };

    const keys = intervalQuantileKeys(context.interval);
    let intervalPolygon: PolygonDrawable | null = null;
    if (keys) {
        const lower = requireQuantile(forecast, keys[0], model);
        const upper = requireQuantile(forecast, keys[1], model);
        const reversedDates = [...dates].reverse();
        const reversedUpper = [...upper].reverse();
        intervalPolygon = {
            kind: "polygon",
            name: `${model} ${context.interval}`,
            x: truthPoint
                ? [truthPoint.date, ...dates, ...reversedDates]
                : [...dates, ...reversedDates],
            y: truthPoint
                ? [truthPoint.y, ...lower, ...reversedUpper]
                : [...lower, ...reversedUpper],
            fillColor: context.color,
            opacity: INTERVAL_OPACITY,
        };
    }

    return { leadInLine, medianLine, intervalPolygon };
}
