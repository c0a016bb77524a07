import { SyntaxEnableController } from "../../src/controller.js";
import { ClientLogger } from "../../src/log.js";
import { ErrorReporter } from "../../src/core/observability.js";
import type { SyntaxEnableOptions } from "../../src/types.js";
import { createHostStub, type HostStub, type HostStubOptions, type StubOutputChannel } from "./host-stub.js";

export interface TestController {
  host: HostStub;
  controller: SyntaxEnableController;
  output: StubOutputChannel;
}

export function createTestController(config: SyntaxEnableOptions = {}, hostOptions: HostStubOptions = {}): TestController {
  const host = createHostStub(hostOptions);
  const controller = new SyntaxEnableController({ host });
  controller.setup(config);
  const output = host.recorded.channels[0];
  if (!output) throw new Error("controller did not create an output channel");
  return { host, controller, output };
}

export function createTestLogger(host: HostStub = createHostStub()): { logger: ClientLogger; lines: string[] } {
  const logger = new ClientLogger("test", host);
  const channel = host.recorded.channels.at(-1);
  if (!channel) throw new Error("logger did not create an output channel");
  return { logger, lines: channel.lines };
}

export function createTestErrors(host: HostStub = createHostStub()): { errors: ErrorReporter; logger: ClientLogger; lines: string[] } {
  const { logger, lines } = createTestLogger(host);
  return { errors: new ErrorReporter(logger, host), logger, lines };
}
