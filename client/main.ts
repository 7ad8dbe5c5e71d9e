import { emitKeypressEvents } from "node:readline";
import { createInterface } from "node:readline/promises";

import { GameClientOrchestrator } from "./client-manager";
import { loadClientConfiguration, type ClientConfiguration } from "./config";
import { TransportEventQueue } from "./event-queue";
import { DEFAULT_INPUT_BINDINGS, KeyboardInputController } from "./input";
import { runLoginForm } from "./login";
import { createConsoleLogger, type Logger } from "./logger";
import { WebSocketTransport } from "./network";
import { TerminalRenderer } from "./render";
import { HttpSessionClient, type Session } from "./session";

const promptForSession = async (configuration: ClientConfiguration, logger: Logger): Promise<Session | null> => {
  const readline = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await runLoginForm({
      prompter: {
        ask: (question) => readline.question(question),
        notify: (message) => {
          process.stdout.write(`${message}\n`);
        },
      },
      defaults: configuration.server,
      createSessionClient: (endpoints) => new HttpSessionClient(endpoints, logger.child("session")),
      logger,
    });
  } finally {
    readline.close();
  }
};

const play = (configuration: ClientConfiguration, session: Session, logger: Logger): Promise<void> =>
  new Promise((resolve) => {
    const events = new TransportEventQueue();
    const transport = new WebSocketTransport(
      {
        url: session.websocketUrl,
        token: session.token,
        ...configuration.transport,
      },
      events,
      logger.child("transport"),
    );
    const renderer = new TerminalRenderer({
      grid: configuration.grid,
      cellWidth: configuration.cellWidth,
      colors: configuration.colors,
    });
    const orchestrator = new GameClientOrchestrator(
      {
        grid: configuration.grid,
        positionSendIntervalMs: configuration.positionSendIntervalMs,
        logoutGraceMs: configuration.logoutGraceMs,
        stopTimeoutMs: configuration.transport.stopTimeoutMs,
      },
      { session, transport, events, renderer, output: process.stdout, logger },
    );

    emitKeypressEvents(process.stdin);
    const inputController = new KeyboardInputController({
      source: process.stdin,
      dispatcher: orchestrator,
      bindings: DEFAULT_INPUT_BINDINGS,
    });

    const handleSignal = (): void => {
      orchestrator.requestExit();
    };
    process.once("SIGINT", handleSignal);
    process.once("SIGTERM", handleSignal);

    orchestrator.boot({
      onConnected: () => {
        logger.info(`connected as user ${session.userId}`);
      },
      onDisconnected: (code, reason) => {
        logger.info(`disconnected (code ${code}${reason ? `, ${reason}` : ""})`);
      },
      onError: (error) => {
        // Already on the status line.
        logger.debug(`client error: ${error.message}`);
      },
      onExit: () => {
        inputController.unregister();
        process.off("SIGINT", handleSignal);
        process.off("SIGTERM", handleSignal);
        resolve();
      },
    });
    inputController.register();
  });

const run = async (): Promise<void> => {
  const configuration = loadClientConfiguration();
  const logger = createConsoleLogger({ scope: "grid-client", level: configuration.logLevel });

  const session = await promptForSession(configuration, logger);
  if (!session) {
    return;
  }
  await play(configuration, session, logger);
  process.stdout.write("Bye.\n");
};

run().catch((error: unknown) => {
  console.error("[grid-client] fatal error", error);
  process.exitCode = 1;
});
