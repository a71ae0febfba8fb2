import type {
    Drawable,
    LineDrawable,
    PlotLayout,
    SelectionState,
    VizConfig,
    VizData,
} from "../types/vizTypes";
import { buildModelDrawables, type ModelDrawables } from "./seriesTransformer";

export const NO_DATA_TITLE = "No Visualization Data Found";
export const CURRENT_TRUTH_COLOR = "darkgray";
export const AS_OF_TRUTH_COLOR = "black";

export function modelColor(
    config: VizConfig,
    selection: SelectionState,
    model: string
): string {
    const index = config.models.indexOf(model);
    return selection.colors[index] ?? selection.colors[0];
}

export function buildLayout(
    config: VizConfig,
    selection: SelectionState,
    hasDrawables: boolean
): PlotLayout {
    if (!hasDrawables) {
        return {
            title: NO_DATA_TITLE,
            noData: true,
            xaxis: { title: "", range: null },
            yaxis: { title: "" },
        };
    }
    const targetVar = config.targetVariables.find(
        (tv) => tv.value === selection.targetVariable
    );
    const unit = config.units.find((u) => u.value === selection.unit);
    const targetText = targetVar?.text ?? selection.targetVariable;
    const unitText = unit?.text ?? selection.unit;
    return {
        title: `Forecasts of ${targetText} in ${unitText} as of ${selection.asOfDate}`,
        noData: false,
        xaxis: { title: "Date", range: config.xAxisRange },
        yaxis: {
            title: `${targetVar?.plot_text ?? targetText} (${unitText})`,
        },
    };
}

function truthLine(
    name: string,
    x: string[],
    y: number[],
    color: string
): LineDrawable {
    return { kind: "line", name, x, y, color, showMarkers: true, showLegend: true };
}

/**
 * Combines truth lines and every checked model's drawables into one list,
 * in draw order: current truth, as-of truth, all lead-ins, then each
 * model's median line and interval polygon.
 */
export function assemblePlot(
    config: VizConfig,
    selection: SelectionState,
    data: VizData
): { drawables: Drawable[]; layout: PlotLayout } {
    const drawables: Drawable[] = [];
    const { currentTruth, asOfTruth, forecasts } = data;

    if (
        selection.selectedTruth.includes("Current Truth") &&
        currentTruth &&
        currentTruth.date.length > 0
    ) {
        drawables.push(
            truthLine(
                `Current Truth (as of ${config.currentDate})`,
                currentTruth.date,
                currentTruth.y,
                CURRENT_TRUTH_COLOR
            )
        );
    }
    if (
        selection.selectedTruth.includes("Truth as of") &&
        asOfTruth &&
        asOfTruth.date.length > 0
    ) {
        drawables.push(
            truthLine(
                `Truth as of ${selection.asOfDate}`,
                asOfTruth.date,
                asOfTruth.y,
                AS_OF_TRUTH_COLOR
            )
        );
    }

    const showMarkers = !config.lineOnlyTargetVariables.includes(
        selection.targetVariable
    );
    const perModel: ModelDrawables[] = [];
    for (const model of config.models) {
        if (!selection.selectedModels.includes(model) || !(model in forecasts)) {
            continue;
        }
        const built = buildModelDrawables(model, forecasts, {
            interval: selection.interval,
            color: modelColor(config, selection, model),
            asOfTruth,
            showMarkers,
        });
        if (built) perModel.push(built);
    }

    for (const built of perModel) {
        drawables.push(built.leadInLine);
    }
    for (const built of perModel) {
        drawables.push(built.medianLine);
        if (built.intervalPolygon) drawables.push(built.intervalPolygon);
    }

    return {
        drawables,
        layout: buildLayout(config, selection, drawables.length > 0),
    };
}
