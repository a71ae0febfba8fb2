import { vi } from "vitest";
import type { VizDataFetcher, VizDataResponse } from "../dataClient";
import type { ModelForecast, TruthSeries, VizState } from "../types/vizTypes";
import { resolveVizOptions, type VizOptions } from "../Utils/vizOptions";
import type { VizView } from "../Viz/controller";

export const makeOptions = (overrides: Partial<VizOptions> = {}): VizOptions => ({
    target_variables: [
        { value: "cases", text: "Cases", plot_text: "Weekly cases" },
        { value: "hosp", text: "Hospitalizations", plot_text: "Weekly hospitalizations" },
    ],
    units: [
        { value: "US", text: "US" },
        { value: "48", text: "Texas" },
    ],
    intervals: ["0%", "50%", "95%"],
    available_as_ofs: {
        cases: ["2022-01-10", "2022-01-03", "2022-01-17"],
        hosp: ["2022-01-03", "2022-01-10"],
    },
    current_date: "2022-01-24",
    models: ["A", "B", "C"],
    initial_checked_models: ["A", "B"],
    initial_target_var: "cases",
    initial_unit: "US",
    init_interval: "50%",
    ...overrides,
});

export const makeState = (options: VizOptions = makeOptions()): VizState => {
    const { config, selection } = resolveVizOptions(options);
    return {
        config,
        selection,
        data: { currentTruth: null, asOfTruth: null, forecasts: {} },
        status: { isLoading: false, dataError: null },
    };
};

export const forecast = (
    dates: string[],
    quantiles: Record<string, number[]>
): ModelForecast => ({ target_end_date: dates, quantiles });

export const AS_OF_TRUTH: TruthSeries = {
    date: ["2022-01-03", "2022-01-10"],
    y: [4, 8],
};

export const CURRENT_TRUTH: TruthSeries = {
    date: ["2022-01-03", "2022-01-10", "2022-01-17"],
    y: [4, 9, 12],
};

// wire shape, as the data endpoint sends it
export const FORECASTS_BODY = {
    A: {
        target_end_date: ["2022-01-24", "2022-01-17"],
        "q0.25": [25, 15],
        "q0.5": [30, 20],
        "q0.75": [35, 25],
    },
    C: {
        target_end_date: ["2022-01-17"],
        "q0.25": [5],
        "q0.5": [6],
        "q0.75": [7],
    },
};

export const jsonResponse = (body: unknown): VizDataResponse => ({
    ok: true,
    status: 200,
    statusText: "OK",
    json: async () => body,
});

/**
 * Answers every truth request with `truth` and every forecast request with
 * `forecasts`.
 */
export const createMockFetcher = (
    payloads: { truth?: unknown; forecasts?: unknown } = {}
) =>
    vi.fn<VizDataFetcher>(async (isForecast) =>
        jsonResponse(
            isForecast ? payloads.forecasts ?? FORECASTS_BODY : payloads.truth ?? AS_OF_TRUTH
        )
    );

export const createMockView = () =>
    ({
        setBusy: vi.fn(),
        renderRoster: vi.fn(),
        renderPlot: vi.fn(),
        renderAsOf: vi.fn(),
        renderError: vi.fn(),
        syncControls: vi.fn(),
    }) satisfies VizView;
