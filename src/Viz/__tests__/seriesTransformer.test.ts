import { describe, expect, it } from "vitest";
import { AS_OF_TRUTH, forecast } from "../../__tests__/fixtures";
import type { ForecastSet } from "../../types/vizTypes";
import {
    buildModelDrawables,
    intervalQuantileKeys,
    SeriesDataError,
    sortModelForecast,
} from "../seriesTransformer";

const forecasts: ForecastSet = {
    A: forecast(["2022-01-24", "2022-01-17"], {
        "q0.25": [25, 15],
        "q0.5": [30, 20],
        "q0.75": [35, 25],
    }),
    Empty: forecast([], { "q0.5": [] }),
};

const context = {
    interval: "50%",
    color: "#0d0887",
    asOfTruth: AS_OF_TRUTH,
    showMarkers: true,
};

describe("sortModelForecast", () => {
    it("should reorder dates and quantiles by calendar date", () => {
        const raw = forecast(["2022-01-17", "2022-01-10"], { "q0.5": [20, 10] });

        const sorted = sortModelForecast(raw);

        expect(sorted).toEqual({
            target_end_date: ["2022-01-10", "2022-01-17"],
            quantiles: { "q0.5": [10, 20] },
        });
        expect(raw.target_end_date).toEqual(["2022-01-17", "2022-01-10"]);
    });
});

describe("intervalQuantileKeys", () => {
    it("should resolve symmetric quantile keys", () => {
        expect(intervalQuantileKeys("50%")).toEqual(["q0.25", "q0.75"]);
        expect(intervalQuantileKeys("95%")).toEqual(["q0.025", "q0.975"]);
        expect(intervalQuantileKeys("100%")).toEqual(["q0", "q1"]);
    });

    it("should have no interval for 0%", () => {
        expect(intervalQuantileKeys("0%")).toBeNull();
    });

    it("should reject labels it cannot read", () => {
        expect(() => intervalQuantileKeys("wide")).toThrow(SeriesDataError);
        expect(() => intervalQuantileKeys("150%")).toThrow("Interval wider than 100%: 150%");
    });
});

describe("buildModelDrawables", () => {
    it("should connect the last as-of truth point to the first forecast", () => {
        const built = buildModelDrawables("A", forecasts, context);

        expect(built?.leadInLine).toEqual({
            kind: "line",
            name: "A lead-in",
            x: ["2022-01-10", "2022-01-17"],
            y: [8, 20],
            color: "#0d0887",
            showMarkers: false,
            showLegend: false,
        });
        expect(built?.medianLine).toEqual({
            kind: "line",
            name: "A",
            x: ["2022-01-17", "2022-01-24"],
            y: [20, 30],
            color: "#0d0887",
            showMarkers: true,
            showLegend: true,
        });
    });

    it("should close the interval polygon through the truth point", () => {
        const built = buildModelDrawables("A", forecasts, context);

        expect(built?.intervalPolygon).toEqual({
            kind: "polygon",
            name: "A 50%",
            x: ["2022-01-10", "2022-01-17", "2022-01-24", "2022-01-24", "2022-01-17"],
            y: [8, 15, 25, 35, 25],
            fillColor: "#0d0887",
            opacity: 0.3,
        });
    });

    it("should start at the first forecast point without as-of truth", () => {
        const built = buildModelDrawables("A", forecasts, { ...context, asOfTruth: null });

        expect(built?.leadInLine.x).toEqual(["2022-01-17"]);
        expect(built?.leadInLine.y).toEqual([20]);
        expect(built?.intervalPolygon?.x).toHaveLength(4);
        expect(built?.intervalPolygon?.y).toEqual([15, 25, 35, 25]);
    });

    it("should build only lines for the 0% interval", () => {
        const built = buildModelDrawables("A", forecasts, { ...context, interval: "0%" });

        expect(built?.intervalPolygon).toBeNull();
        expect(built?.medianLine.y).toEqual([20, 30]);
    });

    it("should skip absent and empty models", () => {
        expect(buildModelDrawables("Z", forecasts, context)).toBeNull();
        expect(buildModelDrawables("Empty", forecasts, context)).toBeNull();
    });

    it("should name the missing quantile", () => {
        expect(() =>
            buildModelDrawables("A", forecasts, { ...context, interval: "95%" })
        ).toThrow("Forecast for A has no q0.025");
    });
});
