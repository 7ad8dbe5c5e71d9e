import { parsePort, type ServerAddress } from "./config";
import { silentLogger, type Logger } from "./logger";
import {
  SessionError,
  resolveServerEndpoints,
  type ServerEndpoints,
  type Session,
  type SessionClient,
} from "./session";

export type LoginAction = "login" | "register" | "quit";

export interface LoginPrompter {
  readonly ask: (question: string) => Promise<string>;
  readonly notify: (message: string) => void;
}

export interface LoginFormOptions {
  readonly prompter: LoginPrompter;
  readonly defaults: ServerAddress;
  readonly createSessionClient: (endpoints: ServerEndpoints) => SessionClient;
  readonly logger?: Logger;
}

export const parseLoginAction = (answer: string): LoginAction | null => {
  switch (answer.trim().toLowerCase()) {
    case "":
    case "l":
    case "login":
      return "login";
    case "r":
    case "register":
      return "register";
    case "q":
    case "quit":
      return "quit";
    default:
      return null;
  }
};

/**
 * Asks for credentials and a server until a login succeeds or the user quits.
 * A failed attempt is reported and the form starts over.
 */
export const runLoginForm = async ({
  prompter,
  defaults,
  createSessionClient,
  logger = silentLogger,
}: LoginFormOptions): Promise<Session | null> => {
  while (true) {
    const action = parseLoginAction(await prompter.ask("[l]ogin, [r]egister or [q]uit? "));
    if (action === null) {
      prompter.notify("Please answer l, r or q.");
      continue;
    }
    if (action === "quit") {
      return null;
    }

    const hostAnswer = (await prompter.ask(`Server host [${defaults.host}]: `)).trim();
    const portAnswer = (await prompter.ask(`Server port [${defaults.port}]: `)).trim();
    const login = (await prompter.ask("Login: ")).trim();
    const password = await prompter.ask("Password: ");

    let port: number;
    try {
      port = portAnswer.length > 0 ? parsePort(portAnswer, "Server port") : defaults.port;
    } catch (error) {
      prompter.notify(error instanceof Error ? error.message : String(error));
      continue;
    }

    const client = createSessionClient(resolveServerEndpoints(hostAnswer || defaults.host, port));
    try {
      if (action === "register") {
        await client.register({ login, password });
        prompter.notify("Registration succeeded. You can log in now.");
        continue;
      }
      const session = await client.login({ login, password });
      prompter.notify(`Logged in as user ${session.userId}.`);
      return session;
    } catch (error) {
      if (error instanceof SessionError) {
        logger.warn(`${action} failed (${error.kind}): ${error.message}`);
        prompter.notify(error.message);
        continue;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${action} failed unexpectedly: ${message}`);
      prompter.notify(`Unexpected error: ${message}`);
    }
  }
};
