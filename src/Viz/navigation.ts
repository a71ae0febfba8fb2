export type StepDirection = 1 | -1;

export function neighborAsOf(
    asOfs: string[],
    current: string,
    direction: StepDirection
): string | null {
    const index = asOfs.indexOf(current);
    if (index === -1) return null;
    const next = index + direction;
    if (next < 0 || next >= asOfs.length) return null;
    return asOfs[next];
}

export function asOfBounds(
    asOfs: string[],
    current: string
): { atFirst: boolean; atLast: boolean } {
    const index = asOfs.indexOf(current);
    return {
        atFirst: index <= 0,
        atLast: index === -1 || index >= asOfs.length - 1,
    };
}

// inputs that take no typed text keep the arrow keys for paging
const NON_TEXT_INPUT_TYPES = new Set([
    "checkbox",
    "radio",
    "button",
    "submit",
    "reset",
    "image",
    "color",
    "file",
]);

function isTextEntry(target: EventTarget | null): boolean {
    if (target instanceof HTMLInputElement) {
        return !NON_TEXT_INPUT_TYPES.has(target.type);
    }
    if (!(target instanceof HTMLElement)) return false;
    return (
        target instanceof HTMLTextAreaElement ||
        target instanceof HTMLSelectElement ||
        target.isContentEditable
    );
}

export function directionForKey(event: KeyboardEvent): StepDirection | null {
    if (event.altKey || event.ctrlKey || event.metaKey) return null;
    if (isTextEntry(event.target)) return null;
    if (event.key === "ArrowLeft") return -1;
    if (event.key === "ArrowRight") return 1;
    return null;
}

/**
 * Left/right arrows step the as-of date. Returns the detach function.
 */
export function attachKeyboardNavigation(params: {
    target: Document | HTMLElement;
    onStep: (direction: StepDirection) => void;
}): () => void {
    const { target, onStep } = params;
    const listener = (event: Event) => {
        if (!(event instanceof KeyboardEvent)) return;
        const direction = directionForKey(event);
        if (direction === null) return;
        event.preventDefault();
        onStep(direction);
    };
    target.addEventListener("keydown", listener);
    return () => target.removeEventListener("keydown", listener);
}
