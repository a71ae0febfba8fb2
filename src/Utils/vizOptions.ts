import { z } from "zod";
import type {
    SelectionState,
    TruthName,
    VizConfig,
} from "../types/vizTypes";
import { TRUTH_NAMES } from "../types/vizTypes";
import { buildColorCycle, MODEL_PALETTE } from "./colorUtils";
import { addWeeks, compareDates, isValidDate } from "./dateUtils";

export const DEFAULT_MAX_SELECTABLE_MODELS = 100;
export const DEFAULT_FETCH_TIMEOUT_MS = 30000;
export const DEFAULT_LINE_ONLY_TARGET_VARS = ["hosp"];

export class VizConfigError extends Error {
    errors: string[];

    constructor(errors: string[]) {
        super(`Invalid viz options: ${errors.join("; ")}`);
        this.name = "VizConfigError";
        this.errors = errors;
    }
}

const targetVariableSchema = z.object({
    value: z.string().min(1),
    text: z.string(),
    plot_text: z.string(),
});

const unitSchema = z.object({
    value: z.string().min(1),
    text: z.string(),
});

const intervalSchema = z.union([
    z
        .string()
        .regex(/^\d+(\.\d+)?%$/, "interval labels look like '95%'")
        .refine(
            (label) => Number.parseFloat(label) <= 100,
            "interval must be between 0% and 100%"
        ),
    z.number().int().min(0).max(100),
]);

export const vizOptionsSchema = z.object({
    target_variables: z.array(targetVariableSchema).min(1),
    units: z.array(unitSchema).min(1),
    intervals: z.array(intervalSchema).min(1),
    available_as_ofs: z.record(z.string(), z.array(z.string())),
    current_date: z.string(),
    models: z.array(z.string()),
    initial_checked_models: z.array(z.string()).optional(),
    default_models: z.array(z.string()).optional(),
    initial_target_var: z.string(),
    initial_unit: z.string(),
    init_interval: intervalSchema,
    initial_as_of: z.string().optional(),
    initial_truth: z.array(z.enum(["Current Truth", "Truth as of"])).optional(),
    disclaimer: z.string().optional(),
    models_at_top: z.array(z.string()).optional(),
    x_axis_range_offset: z
        .tuple([z.number().int().min(1), z.number().int().min(1)])
        .nullable()
        .optional(),
    max_selectable_models: z.number().int().min(1).optional(),
    line_only_target_vars: z.array(z.string()).optional(),
    fetch_timeout_ms: z.number().positive().optional(),
});

export type VizOptions = z.input<typeof vizOptionsSchema>;
type ParsedVizOptions = z.output<typeof vizOptionsSchema>;

export function intervalLabel(interval: string | number): string {
    return typeof interval === "number" ? `${interval}%` : interval;
}

/**
 * Moves `modelsAtTop` to the front, in their given order, keeping the rest in
 * roster order.
 */
export function orderModels(models: string[], modelsAtTop: string[] = []): string[] {
    const top = modelsAtTop.filter((model) => models.includes(model));
    return [...top, ...models.filter((model) => !top.includes(model))];
}

function formatIssues(error: z.ZodError): string[] {
    return error.issues.map(
        (issue) => `${issue.path.join(".") || "options"}: ${issue.message}`
    );
}

function crossFieldErrors(options: ParsedVizOptions): string[] {
    const errors: string[] = [];
    const targetVarValues = options.target_variables.map((tv) => tv.value);
    const unitValues = options.units.map((unit) => unit.value);
    const intervals = options.intervals.map(intervalLabel);

    if (!targetVarValues.includes(options.initial_target_var)) {
        errors.push(
            `initial_target_var is invalid: ${options.initial_target_var}. expected one of ${targetVarValues.join(", ")}`
        );
    }
    if (!unitValues.includes(options.initial_unit)) {
        errors.push(
            `initial_unit is invalid: ${options.initial_unit}. expected one of ${unitValues.join(", ")}`
        );
    }
    if (!intervals.includes(intervalLabel(options.init_interval))) {
        errors.push(
            `init_interval is invalid: ${intervalLabel(options.init_interval)}. expected one of ${intervals.join(", ")}`
        );
    }
    for (const targetVar of targetVarValues) {
        const asOfs = options.available_as_ofs[targetVar];
        if (!asOfs || asOfs.length === 0) {
            errors.push(`available_as_ofs has no dates for target variable ${targetVar}`);
            continue;
        }
        const badDates = asOfs.filter((date) => !isValidDate(date));
        if (badDates.length > 0) {
            errors.push(
                `available_as_ofs for ${targetVar} has invalid dates: ${badDates.join(", ")}`
            );
        }
    }
    if (!isValidDate(options.current_date)) {
        errors.push(`current_date is not a valid date: ${options.current_date}`);
    }

    const checkedModels = options.initial_checked_models ?? options.default_models;
    if (!checkedModels) {
        errors.push("initial_checked_models (or default_models) is required");
    } else {
        const unknown = checkedModels.filter((model) => !options.models.includes(model));
        if (unknown.length > 0) {
            errors.push(`initial_checked_models has unknown models: ${unknown.join(", ")}`);
        }
    }

    const unknownTop = (options.models_at_top ?? []).filter(
        (model) => !options.models.includes(model)
    );
    if (unknownTop.length > 0) {
        errors.push(`models_at_top has unknown models: ${unknownTop.join(", ")}`);
    }

    if (options.initial_as_of !== undefined) {
        const asOfs = options.available_as_ofs[options.initial_target_var] ?? [];
        if (!asOfs.includes(options.initial_as_of)) {
            errors.push(
                `initial_as_of ${options.initial_as_of} is not available for ${options.initial_target_var}`
            );
        }
    }
    return errors;
}

/**
 * Returns every problem found in `raw`, or [] when it can be used to start
 * the viz.
 */
export function validateVizOptions(raw: unknown): string[] {
    const parsed = vizOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        return formatIssues(parsed.error);
    }
    return crossFieldErrors(parsed.data);
}

/**
 * Validates `raw` and splits it into the static config and the initial
 * selection. Throws `VizConfigError` listing every problem.
 */
export function resolveVizOptions(raw: unknown): {
    config: VizConfig;
    selection: SelectionState;
} {
    const parsed = vizOptionsSchema.safeParse(raw);
    if (!parsed.success) {
        throw new VizConfigError(formatIssues(parsed.error));
    }
    const options = parsed.data;
    const errors = crossFieldErrors(options);
    if (errors.length > 0) {
        throw new VizConfigError(errors);
    }

    const availableAsOfs: Record<string, string[]> = {};
    for (const [targetVar, asOfs] of Object.entries(options.available_as_ofs)) {
        availableAsOfs[targetVar] = [...asOfs].sort(compareDates);
    }
    const initialAsOfs = availableAsOfs[options.initial_target_var];
    const lastAsOf = initialAsOfs[initialAsOfs.length - 1];
    const offset = options.x_axis_range_offset ?? null;
    const models = orderModels(options.models, options.models_at_top);
    const checkedModels = options.initial_checked_models ?? options.default_models ?? [];
    const selectedTruth: TruthName[] = options.initial_truth ?? [...TRUTH_NAMES];

    const config: VizConfig = {
        targetVariables: options.target_variables,
        units: options.units,
        intervals: options.intervals.map(intervalLabel),
        availableAsOfs,
        currentDate: options.current_date,
        models,
        disclaimer: options.disclaimer ?? "",
        xAxisRange: offset
            ? [addWeeks(lastAsOf, -offset[0]), addWeeks(lastAsOf, offset[1])]
            : null,
        maxSelectableModels:
            options.max_selectable_models ?? DEFAULT_MAX_SELECTABLE_MODELS,
        lineOnlyTargetVariables:
            options.line_only_target_vars ?? DEFAULT_LINE_ONLY_TARGET_VARS,
        fetchTimeoutMs: options.fetch_timeout_ms ?? DEFAULT_FETCH_TIMEOUT_MS,
    };

    const selection: SelectionState = {
        targetVariable: options.initial_target_var,
        unit: options.initial_unit,
        interval: intervalLabel(options.init_interval),
        asOfDate: options.initial_as_of ?? lastAsOf,
        selectedTruth,
        selectedModels: models.filter((model) => checkedModels.includes(model)),
        lastSelectedModels: [],
        allModels: false,
        colors: buildColorCycle(models.length, MODEL_PALETTE),
    };

    return { config, selection };
}
