import type { TruthName } from "../types/vizTypes";
import type { StepDirection } from "./navigation";

export type VizCommand =
    | { type: "SetTargetVariable"; value: string }
    | { type: "SetUnit"; value: string }
    | { type: "SetInterval"; value: string }
    | { type: "ToggleTruth"; name: TruthName; checked: boolean }
    | { type: "ToggleModel"; model: string; checked: boolean }
    | { type: "ToggleAllModels"; checked: boolean }
    | { type: "ShuffleColors" }
    | { type: "StepAsOf"; direction: StepDirection };

export type Dispatch = (command: VizCommand) => Promise<void>;
