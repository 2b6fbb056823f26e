import type {
  ControlsArgs,
  GapsArgs,
  MaskArgs,
  ParsedArgs,
  QcArgs,
  WindowsArgs,
} from "./args.js";

export interface CommandHandlers {
  runHelp: (topic: string | null) => number;
  runVersion: () => number;
  runMask: (args: MaskArgs) => number;
  runWindows: (args: WindowsArgs) => number;
  runControls: (args: ControlsArgs) => number;
  runGaps: (args: GapsArgs) => number;
  runQc: (args: QcArgs) => number;
}

/** Route parsed arguments to their handler and return its exit code. */
export function dispatchCommand(result: ParsedArgs, handlers: CommandHandlers): number {
  switch (result.command) {
    case "help":
      return handlers.runHelp(result.topic);
    case "version":
      return handlers.runVersion();
    case "mask":
      return handlers.runMask(result);
    case "windows":
      return handlers.runWindows(result);
    case "controls":
      return handlers.runControls(result);
    case "gaps":
      return handlers.runGaps(result);
    case "qc":
      return handlers.runQc(result);
  }
}
