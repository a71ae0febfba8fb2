import type {
    SelectionState,
    TruthName,
    VizConfig,
} from "../types/vizTypes";
import { TRUTH_NAMES } from "../types/vizTypes";
import { escapeHtml, styleAttr, type Style } from "../Utils/style";
import type { Dispatch, VizCommand } from "../Viz/commands";
import "./controls.css";

const styles: Record<string, Style> = {
    field: {
        display: "flex",
        flexDirection: "column",
        gap: 4,
        marginBottom: 10,
    },
    fieldLabel: {
        fontSize: 11,
        letterSpacing: 0.5,
        textTransform: "uppercase",
        color: "#555",
    },
    modelHeader: {
        display: "flex",
        alignItems: "center",
        justifyContent: "space-between",
        gap: 8,
    },
};

function renderField(label: string, controlHtml: string) {
    return `
    <div style="${styleAttr(styles.field)}">
      <div style="${styleAttr(styles.fieldLabel)}">${label}</div>
      ${controlHtml}
    </div>
  `;
}

function renderSelect(
    dataKey: string,
    options: Array<{ value: string; text: string }>,
    current: string
) {
    return `
    <select data-action="update-select" data-key="${dataKey}">
      ${options
          .map(
              (opt) => `
            <option value="${escapeHtml(opt.value)}" ${opt.value === current ? "selected" : ""}>
              ${escapeHtml(opt.text)}
            </option>
          `
          )
          .join("")}
    </select>
  `;
}

function renderTruthCheckbox(name: TruthName, checked: boolean) {
    return `
    <label class="viz-check">
      <input type="checkbox" data-action="toggle-truth" data-value="${name}" ${checked ? "checked" : ""} />
      ${name}
    </label>
  `;
}

/**
 * The widget's full markup. Rendered once; afterwards only the model list,
 * the plot and the as-of label change.
 */
export function renderVizShell(config: VizConfig, selection: SelectionState): string {
    return `
    <div class="viz-container">
      <div data-role="disclaimer" class="viz-disclaimer" ${config.disclaimer ? "" : "hidden"}>
        ${escapeHtml(config.disclaimer)}
      </div>
      <div class="viz-body">
        <aside class="viz-options">
          ${renderField(
              "Outcome",
              renderSelect("targetVariable", config.targetVariables, selection.targetVariable)
          )}
          ${renderField("Unit", renderSelect("unit", config.units, selection.unit))}
          ${renderField(
              "Interval",
              renderSelect(
                  "interval",
                  config.intervals.map((interval) => ({ value: interval, text: interval })),
                  selection.interval
              )
          )}
          ${renderField(
              "Truth",
              TRUTH_NAMES.map((name) =>
                  renderTruthCheckbox(name, selection.selectedTruth.includes(name))
              ).join("")
          )}
          <div style="${styleAttr(styles.modelHeader)}">
            <label class="viz-check">
              <input type="checkbox" data-action="toggle-all-models" ${selection.allModels ? "checked" : ""} />
              Select all models
            </label>
            <button type="button" data-action="shuffle-colors">Shuffle colours</button>
          </div>
          <div data-role="model-list" class="viz-model-list"></div>
        </aside>
        <main class="viz-main">
          <div data-role="error-banner" class="viz-error" hidden></div>
          <div data-role="viz-plot" class="viz-plot"></div>
          <div class="viz-nav">
            <button type="button" data-action="step-as-of" data-value="-1" aria-label="Previous as-of date">&lt;</button>
            <span data-role="as-of-label" class="viz-as-of"></span>
            <button type="button" data-action="step-as-of" data-value="1" aria-label="Next as-of date">&gt;</button>
          </div>
        </main>
      </div>
    </div>
  `;
}

function isTruthName(value: string | undefined): value is TruthName {
    return TRUTH_NAMES.some((name) => name === value);
}

export function sendCommand(dispatch: Dispatch, command: VizCommand): void {
    dispatch(command).catch((error: unknown) => {
        console.error(`${command.type} failed`, error);
    });
}

interface AttachControlHandlersParams {
    root: HTMLElement;
    dispatch: Dispatch;
    /** Aborting it removes every listener attached here. */
    signal?: AbortSignal;
}

export function attachControlHandlers(params: AttachControlHandlersParams) {
    const { root, dispatch, signal } = params;

    const selectInputs = root.querySelectorAll<HTMLSelectElement>(
        '[data-action="update-select"]'
    );
    selectInputs.forEach((select) =>
        select.addEventListener("change", () => {
            const value = select.value;
            switch (select.dataset.key) {
                case "targetVariable":
                    sendCommand(dispatch, { type: "SetTargetVariable", value });
                    break;
                case "unit":
                    sendCommand(dispatch, { type: "SetUnit", value });
                    break;
                case "interval":
                    sendCommand(dispatch, { type: "SetInterval", value });
                    break;
            }
        }, { signal })
    );

    const truthInputs = root.querySelectorAll<HTMLInputElement>(
        '[data-action="toggle-truth"]'
    );
    truthInputs.forEach((input) =>
        input.addEventListener("change", () => {
            const name = input.dataset.value;
            if (!isTruthName(name)) return;
            sendCommand(dispatch, { type: "ToggleTruth", name, checked: input.checked });
        }, { signal })
    );

    const allModels = root.querySelector<HTMLInputElement>(
        '[data-action="toggle-all-models"]'
    );
    allModels?.addEventListener("change", () => {
        sendCommand(dispatch, { type: "ToggleAllModels", checked: allModels.checked });
    }, { signal });

    const shuffle = root.querySelector<HTMLButtonElement>('[data-action="shuffle-colors"]');
    shuffle?.addEventListener("click", () => {
        sendCommand(dispatch, { type: "ShuffleColors" });
    }, { signal });

    const stepButtons = root.querySelectorAll<HTMLButtonElement>(
        '[data-action="step-as-of"]'
    );
    stepButtons.forEach((btn) =>
        btn.addEventListener("click", () => {
            const direction = btn.dataset.value === "-1" ? -1 : 1;
            sendCommand(dispatch, { type: "StepAsOf", direction });
        }, { signal })
    );
}

/** Pushes the selection into the selects and checkboxes. */
export function syncControls(root: HTMLElement, selection: SelectionState) {
    const values: Record<string, string> = {
        targetVariable: selection.targetVariable,
        unit: selection.unit,
        interval: selection.interval,
    };
    root.querySelectorAll<HTMLSelectElement>('[data-action="update-select"]').forEach(
        (select) => {
            const key = select.dataset.key;
            if (key && key in values) {
                select.value = values[key];
            }
        }
    );
    root.querySelectorAll<HTMLInputElement>('[data-action="toggle-truth"]').forEach(
        (input) => {
            const name = input.dataset.value;
            input.checked = isTruthName(name) && selection.selectedTruth.includes(name);
        }
    );
    const allModels = root.querySelector<HTMLInputElement>(
        '[data-action="toggle-all-models"]'
    );
    if (allModels) {
        allModels.checked = selection.allModels;
    }
}
