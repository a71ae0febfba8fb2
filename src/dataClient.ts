import { z } from "zod";
import type { ForecastSet, ModelForecast, TruthSeries } from "./types/vizTypes";
import { isValidDate } from "./Utils/dateUtils";

const API_BASE_URL = import.meta.env.VITE_DATA_API_URL || "";
const ENV_TIMEOUT_MS = Number(import.meta.env.VITE_FETCH_TIMEOUT_MS);

export const DEFAULT_TIMEOUT_MS =
    Number.isFinite(ENV_TIMEOUT_MS) && ENV_TIMEOUT_MS > 0 ? ENV_TIMEOUT_MS : 30000;

/**
 * The part of a fetch `Response` the viz needs. A real `Response` fits.
 */
export interface VizDataResponse {
    ok?: boolean;
    status?: number;
    statusText?: string;
    json(): Promise<unknown>;
}

export type VizDataFetcher = (
    isForecast: boolean,
    targetKey: string,
    unitAbbrev: string,
    referenceDate: string
) => Promise<VizDataResponse>;

export interface VizDataRequest {
    targetKey: string;
    unitAbbrev: string;
    referenceDate: string;
}

export class DataClientError extends Error {
    statusCode?: number;
    details?: unknown;

    constructor(message: string, statusCode?: number, details?: unknown) {
        super(message);
        this.name = "DataClientError";
        this.statusCode = statusCode;
        this.details = details;
    }
}

const dateString = z.string().refine(isValidDate, "not a valid date");

const truthSeriesSchema = z
    .object({
        date: z.array(dateString),
        y: z.array(z.number()),
    })
    .refine((truth) => truth.date.length === truth.y.length, {
        message: "date and y must have the same length",
    });

// the endpoint answers {} when it has no truth for the request
const truthPayloadSchema = z.union([
    truthSeriesSchema,
    z
        .object({})
        .strict()
        .transform((): null => null),
]);

const modelForecastSchema = z
    .record(z.string(), z.array(z.union([z.string(), z.number()])))
    .transform((raw, ctx): ModelForecast => {
        const dates = raw.target_end_date;
        if (
            !dates ||
            !dates.every((d): d is string => typeof d === "string" && isValidDate(d))
        ) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: "target_end_date must be an array of dates",
            });
            return z.NEVER;
        }

        const quantiles: Record<string, number[]> = {};
        for (const [key, values] of Object.entries(raw)) {
            if (key === "target_end_date") continue;
            const numbers = values.filter((v): v is number => typeof v === "number");
            if (numbers.length !== values.length || numbers.length !== dates.length) {
                ctx.addIssue({
                    code: z.ZodIssueCode.custom,
                    message: `${key} must be ${dates.length} numbers`,
                    path: [key],
                });
                return z.NEVER;
            }
            quantiles[key] = numbers;
        }
        return { target_end_date: dates, quantiles };
    });

const forecastSetSchema = z.record(z.string(), modelForecastSchema);

export function createVizDataFetcher(options: {
    projectId: number | string;
    apiUrl?: string;
}): VizDataFetcher {
    const apiUrl = options.apiUrl ?? API_BASE_URL;
    return (isForecast, targetKey, unitAbbrev, referenceDate) => {
        const params = new URLSearchParams({
            is_forecast: String(isForecast),
            target_key: targetKey,
            unit_abbrev: unitAbbrev,
            reference_date: referenceDate,
        });
        return fetch(
            `${apiUrl}/api/project/${options.projectId}/viz-data/?${params.toString()}`,
            {
                method: "GET",
                credentials: "same-origin",
                headers: { Accept: "application/json" },
            }
        );
    };
}

export function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    label: string
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expiry = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new DataClientError(`${label} timed out after ${timeoutMs}ms`));
        }, timeoutMs);
    });
    return Promise.race([promise, expiry]).finally(() => {
        clearTimeout(timer);
    });
}

async function requestJson(
    fetcher: VizDataFetcher,
    isForecast: boolean,
    request: VizDataRequest,
    timeoutMs: number
): Promise<unknown> {
    const label = `${isForecast ? "forecasts" : "truth"} ${request.targetKey}/${request.unitAbbrev}/${request.referenceDate}`;

    try {
        const response = await withTimeout(
            fetcher(isForecast, request.targetKey, request.unitAbbrev, request.referenceDate),
            timeoutMs,
            label
        );

        if (response.ok === false) {
            throw new DataClientError(
                `HTTP ${response.status ?? "?"}: ${response.statusText ?? ""} (${label})`,
                response.status
            );
        }

        return await withTimeout(response.json(), timeoutMs, label);
    } catch (error) {
        if (error instanceof DataClientError) {
            throw error;
        }
        throw new DataClientError(
            `Failed to fetch ${label}: ${error instanceof Error ? error.message : String(error)}`,
            undefined,
            error
        );
    }
}

function decode<S extends z.ZodTypeAny>(
    schema: S,
    body: unknown,
    what: string
): z.output<S> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
        throw new DataClientError(
            `Unexpected ${what} payload: ${parsed.error.issues
                .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
                .join("; ")}`,
            undefined,
            parsed.error.issues
        );
    }
    return parsed.data;
}

/** Resolves to null when the endpoint has no truth for the request. */
export async function fetchTruth(
    fetcher: VizDataFetcher,
    request: VizDataRequest,
    timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<TruthSeries | null> {
    const body = await requestJson(fetcher, false, request, timeoutMs);
    return decode(truthPayloadSchema, body, "truth");
}

export async function fetchForecasts(
    fetcher: VizDataFetcher,
    request: VizDataRequest,
    timeoutMs: number = DEFAULT_TIMEOUT_MS
): Promise<ForecastSet> {
    const body = await requestJson(fetcher, true, request, timeoutMs);
    return decode(forecastSetSchema, body, "forecast");
}
