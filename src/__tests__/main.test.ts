import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { initialize, VizConfigError } from "../main";
import { createMockFetcher, makeOptions } from "./fixtures";

describe("initialize", () => {
    beforeEach(() => {
        document.body.innerHTML = '<div id="viz"></div>';
        vi.spyOn(console, "log").mockImplementation(() => undefined);
        vi.spyOn(console, "warn").mockImplementation(() => undefined);
    });

    afterEach(() => {
        document.body.innerHTML = "";
    });

    it("should reject a missing container", () => {
        expect(() => initialize("#nowhere", createMockFetcher(), makeOptions())).toThrow(
            "Invalid viz options: container #nowhere not found"
        );
    });

    it("should reject unusable options before touching the page", () => {
        const fetcher = createMockFetcher();

        expect(() =>
            initialize("#viz", fetcher, makeOptions({ initial_unit: "XX" }))
        ).toThrow(VizConfigError);
        expect(fetcher).not.toHaveBeenCalled();
        expect(document.querySelector("#viz")?.innerHTML).toBe("");
    });

    it("should render the widget and draw the first plot", async () => {
        const fetcher = createMockFetcher();

        const handle = initialize("#viz", fetcher, makeOptions({ disclaimer: "Provisional" }));
        await handle.ready;

        expect(fetcher).toHaveBeenCalledTimes(3);
        expect(document.querySelectorAll("svg.viz-svg")).toHaveLength(1);
        expect(
            Array.from(
                document.querySelectorAll<HTMLInputElement>('[data-action="toggle-model"]'),
                (input) => input.dataset.model
            )
        ).toEqual(["A", "C", "B"]);
        expect(document.querySelector('[data-role="disclaimer"]')?.textContent?.trim()).toBe(
            "Provisional"
        );
        expect(document.querySelector('[data-role="as-of-label"]')?.textContent).toBe(
            "As of Jan 17, 2022"
        );
        handle.destroy();
    });

    it("should step the as-of date from the keyboard until destroyed", async () => {
        const fetcher = createMockFetcher();
        const handle = initialize("#viz", fetcher, makeOptions());
        await handle.ready;

        document.body.dispatchEvent(
            new KeyboardEvent("keydown", { key: "ArrowLeft", bubbles: true })
        );
        await vi.waitFor(() => {
            expect(handle.controller.state.selection.asOfDate).toBe("2022-01-10");
            expect(handle.controller.state.status.isLoading).toBe(false);
        });
        expect(fetcher).toHaveBeenCalledTimes(5);

        handle.destroy();
        document.body.dispatchEvent(
            new KeyboardEvent("keydown", { key: "ArrowLeft", bubbles: true })
        );
        expect(handle.controller.state.selection.asOfDate).toBe("2022-01-10");
        expect(fetcher).toHaveBeenCalledTimes(5);
    });
});
