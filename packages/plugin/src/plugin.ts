import { DisposableStore, type DisposableLike } from "@syntax-enable/shared";
import { COMMAND_NAME, completeSubCommand, dispatchCommand } from "./commands.js";
import { SyntaxEnableController, type SyntaxEnableControllerOptions } from "./controller.js";
import { getEditorHost, type EditorHost } from "./host-api.js";

export interface PluginRegistration extends DisposableLike {
  readonly controller: SyntaxEnableController;
}

export interface RegisterPluginOptions extends SyntaxEnableControllerOptions {
  /** Passed to setup() before anything is wired. */
  config?: unknown;
}

const registrations = new WeakMap<EditorHost, PluginRegistration>();

/**
 * Wire the plugin into a host: the exec command and, unless `create_autocmd`
 * is off, attaching documents when their filetype is set. Registering the
 * same host twice returns the first registration.
 */
export function registerPlugin(options: RegisterPluginOptions = {}): PluginRegistration {
  const host = options.host ?? getEditorHost();
  const existing = registrations.get(host);
  if (existing) return existing;

  const controller = new SyntaxEnableController({ host, logger: options.logger });
  if (options.config !== undefined) controller.setup(options.config);

  const store = new DisposableStore();
  store.add(
    host.registerCommand(
      COMMAND_NAME,
      (input) => {
        dispatchCommand(controller, input.args, { bang: input.bang });
      },
      { complete: completeSubCommand },
    ),
  );

  if (controller.config.create_autocmd) {
    store.add(
      host.onDidSetFiletype((event) => {
        if (controller.attachEnabled) {
          controller.attach(event.document, event.filetype);
        }
      }),
    );
  }

  const registration: PluginRegistration = {
    controller,
    dispose: () => {
      registrations.delete(host);
      store.dispose();
      controller.dispose();
    },
  };
  registrations.set(host, registration);
  controller.context.logger.debug("plugin registered", { autocmd: controller.config.create_autocmd });
  return registration;
}
