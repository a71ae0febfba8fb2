import * as d3 from "d3";
import type {
    Drawable,
    LineDrawable,
    PlotLayout,
    PolygonDrawable,
} from "../types/vizTypes";
import "./plot.css";

const DEFAULT_WIDTH = 900;
const DEFAULT_HEIGHT = 500;
const MARGIN = { top: 40, right: 190, bottom: 55, left: 75 };
const LEGEND_ROW_HEIGHT = 18;
const MARKER_RADIUS = 3;

type Point = [Date, number];

let clipCounter = 0;

function toPoints(drawable: Drawable): Point[] {
    return drawable.x.map((date, i): Point => [new Date(date), drawable.y[i]]);
}

function xDomain(drawables: Drawable[], layout: PlotLayout): [Date, Date] | null {
    if (layout.xaxis.range) {
        return [new Date(layout.xaxis.range[0]), new Date(layout.xaxis.range[1])];
    }
    const [min, max] = d3.extent(drawables.flatMap((d) => d.x), (date) => new Date(date));
    if (!min || !max) return null;
    return [min, max];
}

function yDomain(drawables: Drawable[]): [number, number] {
    const values = drawables.flatMap((d) => d.y);
    const min = d3.min(values) ?? 0;
    const max = d3.max(values) ?? 1;
    return [Math.min(0, min), max > min ? max : min + 1];
}

/**
 * Draws the assembled drawables into an SVG inside `container`, replacing
 * whatever was drawn there before. Drawables are painted in list order.
 */
export function renderPlot(
    container: HTMLElement,
    drawables: Drawable[],
    layout: PlotLayout
): void {
    const width = container.clientWidth || DEFAULT_WIDTH;
    const height = container.clientHeight || DEFAULT_HEIGHT;

    const root = d3.select(container);
    root.selectAll("svg.viz-svg").remove();

    const svg = root
        .append("svg")
        .attr("class", "viz-svg")
        .attr("width", width)
        .attr("height", height)
        .attr("viewBox", `0 0 ${width} ${height}`);

    svg.append("text")
        .attr("class", "viz-title")
        .attr("x", width / 2)
        .attr("y", MARGIN.top / 2)
        .attr("text-anchor", "middle")
        .text(layout.title);

    if (layout.noData) return;

    const domain = xDomain(drawables, layout);
    if (!domain) return;

    const innerWidth = width - MARGIN.left - MARGIN.right;
    const innerHeight = height - MARGIN.top - MARGIN.bottom;

    const x = d3.scaleTime().domain(domain).range([0, innerWidth]);
    const y = d3.scaleLinear().domain(yDomain(drawables)).nice().range([innerHeight, 0]);

    const clipId = `viz-clip-${++clipCounter}`;
    svg.append("defs")
        .append("clipPath")
        .attr("id", clipId)
        .append("rect")
        .attr("width", innerWidth)
        .attr("height", innerHeight);

    const plot = svg
        .append("g")
        .attr("class", "viz-plot-area")
        .attr("transform", `translate(${MARGIN.left},${MARGIN.top})`);

    plot.append("g")
        .attr("class", "viz-x-axis")
        .attr("transform", `translate(0,${innerHeight})`)
        .call(d3.axisBottom(x).ticks(8));
    plot.append("g").attr("class", "viz-y-axis").call(d3.axisLeft(y).ticks(6));

    plot.append("text")
        .attr("class", "viz-axis-title")
        .attr("x", innerWidth / 2)
        .attr("y", innerHeight + 42)
        .attr("text-anchor", "middle")
        .text(layout.xaxis.title);
    plot.append("text")
        .attr("class", "viz-axis-title")
        .attr("transform", "rotate(-90)")
        .attr("x", -innerHeight / 2)
        .attr("y", -55)
        .attr("text-anchor", "middle")
        .text(layout.yaxis.title);

    const series = plot.append("g").attr("clip-path", `url(#${clipId})`);
    const line = d3
        .line<Point>()
        .x((p) => x(p[0]))
        .y((p) => y(p[1]));

    const drawLine = (drawable: LineDrawable) => {
        const points = toPoints(drawable);
        series
            .append("path")
            .attr("class", "viz-line")
            .attr("data-name", drawable.name)
            .attr("d", line(points) ?? "")
            .attr("fill", "none")
            .attr("stroke", drawable.color)
            .attr("stroke-width", 2);
        if (drawable.showMarkers) {
            series
                .append("g")
                .attr("class", "viz-markers")
                .attr("data-name", drawable.name)
                .selectAll("circle")
                .data(points)
                .join("circle")
                .attr("class", "viz-marker")
                .attr("cx", (p) => x(p[0]))
                .attr("cy", (p) => y(p[1]))
                .attr("r", MARKER_RADIUS)
                .attr("fill", drawable.color);
        }
    };

    const drawPolygon = (drawable: PolygonDrawable) => {
        const path = line(toPoints(drawable));
        series
            .append("path")
            .attr("class", "viz-interval")
            .attr("data-name", drawable.name)
            .attr("d", path ? `${path}Z` : "")
            .attr("fill", drawable.fillColor)
            .attr("fill-opacity", drawable.opacity)
            .attr("stroke", "none");
    };

    for (const drawable of drawables) {
        if (drawable.kind === "line") {
            drawLine(drawable);
        } else {
            drawPolygon(drawable);
        }
    }

    const legendEntries = drawables.filter(
        (d): d is LineDrawable => d.kind === "line" && d.showLegend
    );
    const legend = svg
        .append("g")
        .attr("class", "viz-legend")
        .attr("transform", `translate(${width - MARGIN.right + 16},${MARGIN.top})`);
    const rows = legend
        .selectAll("g")
        .data(legendEntries)
        .join("g")
        .attr("class", "viz-legend-row")
        .attr("transform", (_, i) => `translate(0,${i * LEGEND_ROW_HEIGHT})`);
    rows.append("line")
        .attr("x1", 0)
        .attr("x2", 16)
        .attr("y1", 0)
        .attr("y2", 0)
        .attr("stroke", (d) => d.color)
        .attr("stroke-width", 2);
    rows.append("text")
        .attr("x", 22)
        .attr("dy", "0.32em")
        .text((d) => d.name);
}
