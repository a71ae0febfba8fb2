import {
    attachControlHandlers,
    renderVizShell,
    sendCommand,
} from "./Components/controls";
import { DomVizView } from "./Components/domView";
import type { VizDataFetcher } from "./dataClient";
import "./style.css";
import type { VizState } from "./types/vizTypes";
import { resolveVizOptions, VizConfigError } from "./Utils/vizOptions";
import type { Dispatch } from "./Viz/commands";
import { VizController } from "./Viz/controller";
import { attachKeyboardNavigation } from "./Viz/navigation";

export { createVizDataFetcher, DataClientError } from "./dataClient";
export type { VizDataFetcher, VizDataResponse } from "./dataClient";
export { validateVizOptions, VizConfigError } from "./Utils/vizOptions";
export type { VizOptions } from "./Utils/vizOptions";
export { SeriesDataError } from "./Viz/seriesTransformer";
export type { VizCommand } from "./Viz/commands";
export { VizController } from "./Viz/controller";
export type { VizView } from "./Viz/controller";

export type VizHandle = {
    controller: VizController;
    /** Settles once the initial fetch has been rendered (or has failed). */
    ready: Promise<void>;
    destroy(): void;
};

function resolveContainer(container: string | HTMLElement): HTMLElement {
    const element =
        typeof container === "string"
            ? document.querySelector<HTMLElement>(container)
            : container;
    if (!element || !element.isConnected) {
        throw new VizConfigError([
            `container ${typeof container === "string" ? container : "element"} not found`,
        ]);
    }
    return element;
}

/**
 * Builds the viz inside `container` (unless its markup is already there),
 * wires the controls and the arrow keys, and starts the initial fetch.
 * Throws `VizConfigError` when the container or the options are unusable.
 */
export function initialize(
    container: string | HTMLElement,
    fetcher: VizDataFetcher,
    options: unknown,
    deps?: { random?: () => number }
): VizHandle {
    const root = resolveContainer(container);
    const { config, selection } = resolveVizOptions(options);

    if (!root.querySelector('[data-role="viz-plot"]')) {
        root.innerHTML = renderVizShell(config, selection);
    }

    const state: VizState = {
        config,
        selection,
        data: { currentTruth: null, asOfTruth: null, forecasts: {} },
        status: { isLoading: false, dataError: null },
    };

    const dispatch: Dispatch = (command) => controller.dispatch(command);
    const view = new DomVizView(root, dispatch);
    const controller = new VizController(state, {
        fetcher,
        view,
        random: deps?.random,
    });

    const listeners = new AbortController();
    attachControlHandlers({ root, dispatch, signal: listeners.signal });
    const detachKeys = attachKeyboardNavigation({
        target: root.ownerDocument,
        onStep: (direction) => sendCommand(dispatch, { type: "StepAsOf", direction }),
    });

    return {
        controller,
        ready: controller.start(),
        destroy: () => {
            listeners.abort();
            detachKeys();
        },
    };
}
