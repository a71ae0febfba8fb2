export const MODEL_PALETTE = [
    "#0d0887",
    "#46039f",
    "#7201a8",
    "#9c179e",
    "#bd3786",
    "#d8576b",
    "#ed7953",
    "#fb9f3a",
    "#fdca26",
    "#f0f921",
];

export const DISABLED_MODEL_COLOR = "lightgray";

/**
 * Tiles the palette so every roster position has a color. Colors repeat
 * every `palette.length` models.
 */
export function buildColorCycle(
    modelCount: number,
    palette: readonly string[] = MODEL_PALETTE
): string[] {
    const repeats = Math.floor(modelCount / palette.length) + 1;
    const colors: string[] = [];
    for (let i = 0; i < repeats; i++) {
        colors.push(...palette);
    }
    return colors;
}

// Fisher-Yates over a copy of the palette
export function shufflePalette(
    palette: readonly string[] = MODEL_PALETTE,
    random: () => number = Math.random
): string[] {
    const shuffled = [...palette];
    for (let i = shuffled.length - 1; i > 0; i--) {
        const j = Math.floor(random() * (i + 1));
        [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
}
