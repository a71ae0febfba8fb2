import { beforeEach, describe, expect, it } from "vitest";
import {
    AS_OF_TRUTH,
    CURRENT_TRUTH,
    forecast,
    makeOptions,
    makeState,
} from "../../__tests__/fixtures";
import type { LineDrawable, VizState } from "../../types/vizTypes";
import { assemblePlot, NO_DATA_TITLE } from "../plotAssembler";

const quantiles = { "q0.25": [1], "q0.5": [2], "q0.75": [3] };

describe("assemblePlot", () => {
    let state: VizState;

    beforeEach(() => {
        state = makeState();
        state.data = {
            currentTruth: CURRENT_TRUTH,
            asOfTruth: AS_OF_TRUTH,
            forecasts: {
                A: forecast(["2022-01-24"], quantiles),
                C: forecast(["2022-01-24"], quantiles),
            },
        };
    });

    it("should draw truth, lead-ins, then each model's line and interval", () => {
        state.selection.selectedModels = ["A", "C"];

        const { drawables } = assemblePlot(state.config, state.selection, state.data);

        expect(drawables.map((d) => d.name)).toEqual([
            "Current Truth (as of 2022-01-24)",
            "Truth as of 2022-01-17",
            "A lead-in",
            "C lead-in",
            "A",
            "A 50%",
            "C",
            "C 50%",
        ]);
    });

    it("should skip unchecked models and checked models without forecasts", () => {
        const { drawables } = assemblePlot(state.config, state.selection, state.data);

        expect(drawables.map((d) => d.name)).toEqual([
            "Current Truth (as of 2022-01-24)",
            "Truth as of 2022-01-17",
            "A lead-in",
            "A",
            "A 50%",
        ]);
    });

    it("should color truth and models", () => {
        state.selection.selectedModels = ["C"];
        const { drawables } = assemblePlot(state.config, state.selection, state.data);
        const lines = drawables.filter((d): d is LineDrawable => d.kind === "line");

        expect(lines.map((d) => d.color)).toEqual(["darkgray", "black", "#7201a8", "#7201a8"]);
    });

    it("should honour the truth checkboxes", () => {
        state.selection.selectedTruth = ["Truth as of"];
        state.selection.selectedModels = [];

        const { drawables } = assemblePlot(state.config, state.selection, state.data);

        expect(drawables).toEqual([
            {
                kind: "line",
                name: "Truth as of 2022-01-17",
                x: AS_OF_TRUTH.date,
                y: AS_OF_TRUTH.y,
                color: "black",
                showMarkers: true,
                showLegend: true,
            },
        ]);
    });

    it("should draw line-only target variables without markers", () => {
        state.selection.targetVariable = "hosp";
        const { drawables } = assemblePlot(state.config, state.selection, state.data);
        const median = drawables.find((d) => d.name === "A");

        expect(median).toMatchObject({ kind: "line", showMarkers: false });
    });

    it("should title the plot from the selection", () => {
        const { layout } = assemblePlot(state.config, state.selection, state.data);

        expect(layout).toEqual({
            title: "Forecasts of Cases in US as of 2022-01-17",
            noData: false,
            xaxis: { title: "Date", range: null },
            yaxis: { title: "Weekly cases (US)" },
        });
    });

    it("should carry the configured x-axis range", () => {
        const ranged = makeState(makeOptions({ x_axis_range_offset: [1, 1] }));
        const { layout } = assemblePlot(ranged.config, ranged.selection, state.data);

        expect(layout.xaxis.range).toEqual(["2022-01-10", "2022-01-24"]);
    });

    it("should report no data when nothing is drawable", () => {
        state.selection.selectedTruth = [];
        state.data.forecasts = {};

        const { drawables, layout } = assemblePlot(state.config, state.selection, state.data);

        expect(drawables).toEqual([]);
        expect(layout.title).toBe(NO_DATA_TITLE);
        expect(layout.title).toBe("No Visualization Data Found");
        expect(layout.noData).toBe(true);
    });
});
