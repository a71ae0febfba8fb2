import {
    fetchForecasts,
    fetchTruth,
    type VizDataFetcher,
    type VizDataRequest,
} from "../dataClient";
import type {
    Drawable,
    ForecastSet,
    PlotLayout,
    RosterEntry,
    SelectionState,
    TruthSeries,
    VizState,
} from "../types/vizTypes";
import { buildColorCycle, MODEL_PALETTE, shufflePalette } from "../Utils/colorUtils";
import type { VizCommand } from "./commands";
import { asOfBounds, neighborAsOf, type StepDirection } from "./navigation";
import { assemblePlot } from "./plotAssembler";
import {
    applySelectAll,
    buildRosterEntries,
    partitionRoster,
    toggleModel,
} from "./roster";
import { SeriesDataError } from "./seriesTransformer";

/**
 * Everything the controller needs from a UI. The DOM implementation lives in
 * Components/domView.ts.
 */
export interface VizView {
    setBusy(busy: boolean): void;
    renderRoster(entries: RosterEntry[], allModels: boolean): void;
    renderPlot(drawables: Drawable[], layout: PlotLayout): void;
    renderAsOf(asOfDate: string, bounds: { atFirst: boolean; atLast: boolean }): void;
    renderError(message: string | null): void;
    syncControls(selection: SelectionState): void;
}

type LoadedKey = Pick<SelectionState, "targetVariable" | "unit" | "asOfDate">;

type FetchResults = {
    asOfTruth: TruthSeries | null;
    forecasts: ForecastSet;
    currentTruth?: TruthSeries | null;
};

export class VizController {
    readonly state: VizState;
    private readonly fetcher: VizDataFetcher;
    private readonly view: VizView;
    private readonly random: () => number;
    private requestSeq = 0;
    private loaded: LoadedKey | null = null;

    constructor(
        state: VizState,
        deps: { fetcher: VizDataFetcher; view: VizView; random?: () => number }
    ) {
        this.state = state;
        this.fetcher = deps.fetcher;
        this.view = deps.view;
        this.random = deps.random ?? Math.random;
    }

    async start(): Promise<void> {
        console.log("start(): initial fetch", this.requestKey(this.state.selection.asOfDate));
        this.view.syncControls(this.state.selection);
        this.renderAsOf();
        this.refreshRoster();
        await this.fetchAndUpdate(true, true);
    }

    async dispatch(command: VizCommand): Promise<void> {
        const selection = this.state.selection;
        switch (command.type) {
            case "SetTargetVariable": {
                if (command.value === selection.targetVariable) return;
                const asOfs = this.state.config.availableAsOfs[command.value];
                if (!asOfs || asOfs.length === 0) {
                    console.warn(`dispatch(): no as-of dates for ${command.value}`);
                    return;
                }
                selection.targetVariable = command.value;
                if (!asOfs.includes(selection.asOfDate)) {
                    selection.asOfDate = asOfs[asOfs.length - 1];
                }
                this.renderAsOf();
                await this.fetchAndUpdate(true, true);
                return;
            }
            case "SetUnit":
                if (command.value === selection.unit) return;
                selection.unit = command.value;
                await this.fetchAndUpdate(true, true);
                return;
            case "SetInterval":
                if (command.value === selection.interval) return;
                selection.interval = command.value;
                await this.fetchAndUpdate(false, null);
                return;
            case "ToggleTruth": {
                const without = selection.selectedTruth.filter((name) => name !== command.name);
                selection.selectedTruth = command.checked ? [...without, command.name] : without;
                await this.fetchAndUpdate(false, null);
                return;
            }
            case "ToggleModel":
                if (command.checked && !this.selectableModels().includes(command.model)) {
                    console.warn(`dispatch(): ${command.model} is not selectable`);
                    return;
                }
                selection.selectedModels = toggleModel(selection, command.model, command.checked);
                selection.allModels = false;
                await this.fetchAndUpdate(false, null);
                return;
            case "ToggleAllModels":
                if (command.checked === selection.allModels) return;
                Object.assign(
                    selection,
                    applySelectAll(selection, this.selectableModels(), command.checked)
                );
                await this.fetchAndUpdate(false, null);
                return;
            case "ShuffleColors":
                this.shuffleColors();
                await this.fetchAndUpdate(false, null);
                return;
            case "StepAsOf":
                await this.stepAsOf(command.direction);
                return;
        }
    }

    async stepAsOf(direction: StepDirection): Promise<void> {
        const selection = this.state.selection;
        const asOfs = this.state.config.availableAsOfs[selection.targetVariable] ?? [];
        const next = neighborAsOf(asOfs, selection.asOfDate, direction);
        if (next === null) return;
        selection.asOfDate = next;
        this.renderAsOf();
        await this.fetchAndUpdate(true, false);
    }

    shuffleColors(): void {
        this.state.selection.colors = buildColorCycle(
            this.state.config.models.length,
            shufflePalette(MODEL_PALETTE, this.random)
        );
    }

    selectableModels(): string[] {
        return partitionRoster(
            this.state.config.models,
            this.state.data.forecasts,
            this.state.config.maxSelectableModels
        ).enabled;
    }

    /**
     * With `shouldFetch` false, redraws from what is already loaded. Otherwise
     * loads as-of truth and forecasts (plus current truth when asked) for the
     * current selection, and redraws only once all of them have settled.
     */
    async fetchAndUpdate(
        shouldFetch: boolean,
        shouldFetchCurrentTruth: boolean | null = null
    ): Promise<void> {
        if (!shouldFetch) {
            this.refreshRoster();
            this.redraw();
            return;
        }

        const token = ++this.requestSeq;
        const { selection, config } = this.state;
        const asOfRequest = this.requestKey(selection.asOfDate);
        const requested: LoadedKey = {
            targetVariable: selection.targetVariable,
            unit: selection.unit,
            asOfDate: selection.asOfDate,
        };

        this.state.status.isLoading = true;
        this.view.setBusy(true);

        const settled = await Promise.allSettled([
            fetchTruth(this.fetcher, asOfRequest, config.fetchTimeoutMs),
            fetchForecasts(this.fetcher, asOfRequest, config.fetchTimeoutMs),
            shouldFetchCurrentTruth
                ? fetchTruth(
                      this.fetcher,
                      this.requestKey(config.currentDate),
                      config.fetchTimeoutMs
                  )
                : Promise.resolve(undefined),
        ]);

        if (token !== this.requestSeq) {
            console.log(`fetchAndUpdate(): discarding superseded request #${token}`);
            return;
        }

        this.state.status.isLoading = false;
        this.view.setBusy(false);

        const [asOfTruth, forecasts, currentTruth] = settled;
        if (
            asOfTruth.status === "rejected" ||
            forecasts.status === "rejected" ||
            currentTruth.status === "rejected"
        ) {
            const reasons = settled
                .filter((result): result is PromiseRejectedResult => result.status === "rejected")
                .map((result) => result.reason);
            reasons.forEach((reason) => console.error("fetchAndUpdate(): fetch failed", reason));
            this.restoreLoadedSelection();
            this.setError(
                reasons
                    .map((reason) => (reason instanceof Error ? reason.message : String(reason)))
                    .join("; ")
            );
            return;
        }

        this.applyResults(requested, {
            asOfTruth: asOfTruth.value,
            forecasts: forecasts.value,
            currentTruth: shouldFetchCurrentTruth ? currentTruth.value ?? null : undefined,
        });
    }

    refreshRoster(): void {
        const { config, selection, data } = this.state;
        this.view.renderRoster(
            buildRosterEntries(config, selection, data.forecasts),
            selection.allModels
        );
    }

    redraw(): void {
        const { config, selection, data } = this.state;
        // labels follow the loaded data while a newer request is pending
        const drawn = this.loaded ? { ...selection, ...this.loaded } : selection;
        let assembled: { drawables: Drawable[]; layout: PlotLayout };
        try {
            assembled = assemblePlot(config, drawn, data);
        } catch (error) {
            if (error instanceof SeriesDataError) {
                console.error("redraw(): cannot build plot", error);
                this.setError(error.message);
                return;
            }
            throw error;
        }
        this.setError(null);
        this.view.renderPlot(assembled.drawables, assembled.layout);
    }

    private applyResults(requested: LoadedKey, results: FetchResults): void {
        const { data, selection } = this.state;
        data.asOfTruth = results.asOfTruth;
        data.forecasts = results.forecasts;
        if (results.currentTruth !== undefined) {
            data.currentTruth = results.currentTruth;
        }
        this.loaded = requested;

        if (selection.allModels) {
            selection.selectedModels = this.selectableModels();
        }
        const missing = selection.selectedModels.filter((model) => !(model in data.forecasts));
        if (missing.length > 0) {
            console.warn(`fetchAndUpdate(): no forecasts for checked models ${missing.join(", ")}`);
        }
        this.refreshRoster();
        this.redraw();
    }

    private restoreLoadedSelection(): void {
        if (!this.loaded) return;
        Object.assign(this.state.selection, this.loaded);
        this.view.syncControls(this.state.selection);
        this.renderAsOf();
    }

    private setError(message: string | null): void {
        this.state.status.dataError = message;
        this.view.renderError(message);
    }

    private renderAsOf(): void {
        const { config, selection } = this.state;
        const asOfs = config.availableAsOfs[selection.targetVariable] ?? [];
        this.view.renderAsOf(selection.asOfDate, asOfBounds(asOfs, selection.asOfDate));
    }

    private requestKey(referenceDate: string): VizDataRequest {
        return {
            targetKey: this.state.selection.targetVariable,
            unitAbbrev: this.state.selection.unit,
            referenceDate,
        };
    }
}
