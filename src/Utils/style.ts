export type Style = Record<string, string | number>;

// numeric values of these properties are written without a unit
const UNITLESS = new Set(["opacity", "flex", "fontWeight", "lineHeight", "zIndex"]);

function cssName(property: string): string {
    return property.replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`);
}

function cssValue(property: string, value: string | number): string {
    if (typeof value === "string") return value;
    return UNITLESS.has(property) ? String(value) : `${value}px`;
}

/** Serializes a style object for a template-string `style="..."` attribute. */
export function styleAttr(style: Style): string {
    return Object.entries(style)
        .map(([property, value]) => `${cssName(property)}:${cssValue(property, value)}`)
        .join(";");
}

export function mergeStyles(...styles: Array<Style | undefined>): Style {
    const merged: Style = {};
    for (const style of styles) {
        if (style) Object.assign(merged, style);
    }
    return merged;
}

const HTML_ESCAPES: Record<string, string> = {
    "&": "&amp;",
    "<": "&lt;",
    ">": "&gt;",
    '"': "&quot;",
    "'": "&#39;",
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c]);
}
