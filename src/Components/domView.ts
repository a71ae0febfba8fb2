import { renderPlot } from "../PlotView/plot";
import type {
    Drawable,
    PlotLayout,
    RosterEntry,
    SelectionState,
} from "../types/vizTypes";
import { formatDateDisplay } from "../Utils/dateUtils";
import type { Dispatch } from "../Viz/commands";
import type { VizView } from "../Viz/controller";
import { syncControls } from "./controls";
import { updateModelList } from "./modelList";

function requireRole(root: HTMLElement, role: string): HTMLElement {
    const element = root.querySelector<HTMLElement>(`[data-role="${role}"]`);
    if (!element) {
        throw new Error(`Viz element [data-role="${role}"] not found`);
    }
    return element;
}

/**
 * VizView over the markup from `renderVizShell`.
 */
export class DomVizView implements VizView {
    private readonly root: HTMLElement;
    private readonly dispatch: Dispatch;
    private readonly plot: HTMLElement;
    private readonly modelList: HTMLElement;
    private readonly asOfLabel: HTMLElement;
    private readonly errorBanner: HTMLElement;

    constructor(root: HTMLElement, dispatch: Dispatch) {
        this.root = root;
        this.dispatch = dispatch;
        this.plot = requireRole(root, "viz-plot");
        this.modelList = requireRole(root, "model-list");
        this.asOfLabel = requireRole(root, "as-of-label");
        this.errorBanner = requireRole(root, "error-banner");
    }

    setBusy(busy: boolean): void {
        this.plot.style.opacity = busy ? "0.3" : "1";
        this.plot.setAttribute("aria-busy", String(busy));
    }

    renderRoster(entries: RosterEntry[], allModels: boolean): void {
        updateModelList({ list: this.modelList, entries, dispatch: this.dispatch });
        const toggleAll = this.root.querySelector<HTMLInputElement>(
            '[data-action="toggle-all-models"]'
        );
        if (toggleAll) {
            toggleAll.checked = allModels;
        }
    }

    renderPlot(drawables: Drawable[], layout: PlotLayout): void {
        renderPlot(this.plot, drawables, layout);
    }

    renderAsOf(asOfDate: string, bounds: { atFirst: boolean; atLast: boolean }): void {
        this.asOfLabel.textContent = `As of ${formatDateDisplay(asOfDate)}`;
        this.asOfLabel.dataset.date = asOfDate;
        this.root
            .querySelectorAll<HTMLButtonElement>('[data-action="step-as-of"]')
            .forEach((btn) => {
                btn.disabled = btn.dataset.value === "-1" ? bounds.atFirst : bounds.atLast;
            });
    }

    renderError(message: string | null): void {
        this.errorBanner.textContent = message ?? "";
        this.errorBanner.hidden = message === null;
    }

    syncControls(selection: SelectionState): void {
        syncControls(this.root, selection);
    }
}
