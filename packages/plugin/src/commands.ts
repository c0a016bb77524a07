import type { SyntaxEnableController } from "./controller.js";
import { NOTIFY_PREFIX } from "./core/observability.js";

export const COMMAND_NAME = "SyntaxEnableExec";

export const SUB_COMMANDS = ["start", "stop", "toggle", "attach", "detach", "ensure_installed"] as const;

export type SubCommand = (typeof SUB_COMMANDS)[number];

export function isSubCommand(value: string): value is SubCommand {
  return (SUB_COMMANDS as readonly string[]).includes(value);
}

export function completeSubCommand(prefix: string): string[] {
  return SUB_COMMANDS.filter((name) => name.startsWith(prefix));
}

function run(controller: SyntaxEnableController, command: SubCommand): void {
  switch (command) {
    case "start":
      controller.start();
      return;
    case "stop":
      controller.stop();
      return;
    case "toggle":
      controller.toggle();
      return;
    case "attach":
      controller.attach();
      return;
    case "detach":
      controller.detach();
      return;
    case "ensure_installed":
      void controller.context.errors.capture("command.ensure_installed", async () => {
        const outcome = await controller.ensureInstalled();
        if (!outcome.ok && outcome.reason === "failed") {
          controller.host.notify(`${NOTIFY_PREFIX} Grammar installation failed`, "error");
        }
      });
      return;
  }
}

export interface DispatchOptions {
  /** Run unguarded; errors reach the caller. */
  bang?: boolean;
}

/**
 * Route one sub-command to the controller. Returns false when the input is
 * not a known sub-command or the operation failed.
 */
export function dispatchCommand(
  controller: SyntaxEnableController,
  input: string,
  options: DispatchOptions = {},
): boolean {
  const host = controller.host;
  const command = input.trim();
  if (!isSubCommand(command)) {
    host.notify(`${NOTIFY_PREFIX} Invalid sub-command "${command}"`, "warn");
    return false;
  }

  if (options.bang) {
    run(controller, command);
    return true;
  }

  const errors = controller.context.errors;
  const result = errors.guard(`command.${command}`, () => run(controller, command), { context: { command } });
  if (!result.ok) {
    host.notify(`${NOTIFY_PREFIX} Command "${command}" failed`, "error");
    return false;
  }
  return true;
}
