import type { RosterEntry } from "../types/vizTypes";
import { escapeHtml, mergeStyles, styleAttr, type Style } from "../Utils/style";
import type { Dispatch } from "../Viz/commands";
import { sendCommand } from "./controls";

const styles: Record<string, Style> = {
    row: { display: "flex", alignItems: "center", gap: 6, marginBottom: 0 },
    rowDisabled: { color: "lightgrey" },
    dot: {
        display: "inline-block",
        width: 10,
        height: 10,
        borderRadius: "50%",
    },
};

function renderModelRow(entry: RosterEntry) {
    return `
    <div class="viz-model-row" style="${styleAttr(
        mergeStyles(styles.row, entry.disabled ? styles.rowDisabled : undefined)
    )}">
      <label>
        <input
          type="checkbox"
          data-action="toggle-model"
          data-model="${escapeHtml(entry.model)}"
          ${entry.checked ? "checked" : ""}
          ${entry.disabled ? 'disabled="disabled"' : ""}
        />
        ${escapeHtml(entry.model)}
        <span class="viz-dot" style="${styleAttr(
            mergeStyles(styles.dot, { backgroundColor: entry.color })
        )}"></span>
      </label>
    </div>
  `;
}

export function renderModelList(entries: RosterEntry[]): string {
    return entries.map(renderModelRow).join("");
}

interface AttachModelListHandlersParams {
    list: HTMLElement;
    dispatch: Dispatch;
}

export function attachModelListHandlers(params: AttachModelListHandlersParams) {
    const { list, dispatch } = params;
    const inputs = list.querySelectorAll<HTMLInputElement>('[data-action="toggle-model"]');
    inputs.forEach((input) =>
        input.addEventListener("change", () => {
            const model = input.dataset.model;
            if (!model) return;
            sendCommand(dispatch, { type: "ToggleModel", model, checked: input.checked });
        })
    );
}

/**
 * Replaces the list contents, so listeners from the previous render go away
 * with their nodes, then re-checks every box from `entries`.
 */
export function updateModelList(params: {
    list: HTMLElement;
    entries: RosterEntry[];
    dispatch: Dispatch;
}) {
    const { list, entries, dispatch } = params;
    list.innerHTML = renderModelList(entries);
    attachModelListHandlers({ list, dispatch });

    const byModel = new Map(entries.map((entry) => [entry.model, entry]));
    list.querySelectorAll<HTMLInputElement>('[data-action="toggle-model"]').forEach((input) => {
        const entry = byModel.get(input.dataset.model ?? "");
        input.checked = entry?.checked ?? false;
    });
}
