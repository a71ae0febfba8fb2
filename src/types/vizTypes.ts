export type TargetVariable = {
    value: string;
    text: string;
    plot_text: string;
};

export type Unit = {
    value: string;
    text: string;
};

export type TruthName = "Current Truth" | "Truth as of";

export const TRUTH_NAMES: readonly TruthName[] = ["Current Truth", "Truth as of"];

export type TruthSeries = {
    date: string[];
    y: number[];
};

// quantiles are keyed the way the data endpoint names them, e.g. "q0.025"
export type ModelForecast = {
    target_end_date: string[];
    quantiles: Record<string, number[]>;
};

export type ForecastSet = Record<string, ModelForecast>;

export type VizConfig = {
    targetVariables: TargetVariable[];
    units: Unit[];
    intervals: string[];
    availableAsOfs: Record<string, string[]>;
    currentDate: string;
    /** Roster order, `models_at_top` already applied. */
    models: string[];
    disclaimer: string;
    xAxisRange: [string, string] | null;
    maxSelectableModels: number;
    lineOnlyTargetVariables: string[];
    fetchTimeoutMs: number;
};

export type SelectionState = {
    targetVariable: string;
    unit: string;
    interval: string;
    asOfDate: string;
    selectedTruth: TruthName[];
    selectedModels: string[];
    lastSelectedModels: string[];
    allModels: boolean;
    colors: string[];
};

export type VizData = {
    currentTruth: TruthSeries | null;
    asOfTruth: TruthSeries | null;
    forecasts: ForecastSet;
};

export type VizStatus = {
    isLoading: boolean;
    dataError: string | null;
};

export type VizState = {
    config: VizConfig;
    selection: SelectionState;
    data: VizData;
    status: VizStatus;
};

export type LineDrawable = {
    kind: "line";
    name: string;
    x: string[];
    y: number[];
    color: string;
    showMarkers: boolean;
    showLegend: boolean;
};

export type PolygonDrawable = {
    kind: "polygon";
    name: string;
    x: string[];
    y: number[];
    fillColor: string;
    opacity: number;
};

export type Drawable = LineDrawable | PolygonDrawable;

export type PlotLayout = {
    title: string;
    noData: boolean;
    xaxis: { title: string; range: [string, string] | null };
    yaxis: { title: string };
};

export type RosterEntry = {
    model: string;
    color: string;
    checked: boolean;
    disabled: boolean;
};
