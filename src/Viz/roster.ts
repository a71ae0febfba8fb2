import type {
    ForecastSet,
    RosterEntry,
    SelectionState,
    VizConfig,
} from "../types/vizTypes";
import { DISABLED_MODEL_COLOR } from "../Utils/colorUtils";
import { modelColor } from "./plotAssembler";

/**
 * A model is selectable when it has forecasts and sits below the roster cap.
 * Both groups keep roster order.
 */
export function partitionRoster(
    models: string[],
    forecasts: ForecastSet,
    maxSelectable: number
): { enabled: string[]; disabled: string[] } {
    const enabled: string[] = [];
    const disabled: string[] = [];
    models.forEach((model, index) => {
        if (index < maxSelectable && model in forecasts) {
            enabled.push(model);
        } else {
            disabled.push(model);
        }
    });
    return { enabled, disabled };
}

export function buildRosterEntries(
    config: VizConfig,
    selection: SelectionState,
    forecasts: ForecastSet
): RosterEntry[] {
    const { enabled, disabled } = partitionRoster(
        config.models,
        forecasts,
        config.maxSelectableModels
    );
    return [
        ...enabled.map((model) => ({
            model,
            color: modelColor(config, selection, model),
            checked: selection.selectedModels.includes(model),
            disabled: false,
        })),
        ...disabled.map((model) => ({
            model,
            color: DISABLED_MODEL_COLOR,
            checked: false,
            disabled: true,
        })),
    ];
}

export function toggleModel(
    selection: SelectionState,
    model: string,
    checked: boolean
): string[] {
    const without = selection.selectedModels.filter((m) => m !== model);
    return checked ? [...without, model] : without;
}

/**
 * Select-all on: remember the manual selection and take every selectable
 * model. Select-all off: restore what was remembered.
 */
export function applySelectAll(
    selection: SelectionState,
    selectable: string[],
    checked: boolean
): Pick<SelectionState, "selectedModels" | "lastSelectedModels" | "allModels"> {
    if (checked) {
        return {
            selectedModels: [...selectable],
            lastSelectedModels: [...selection.selectedModels],
            allModels: true,
        };
    }
    return {
        selectedModels: [...selection.lastSelectedModels],
        lastSelectedModels: selection.lastSelectedModels,
        allModels: false,
    };
}
