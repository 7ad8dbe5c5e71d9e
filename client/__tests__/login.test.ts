import { describe, expect, it, vi } from "vitest";

import { parseLoginAction, runLoginForm, type LoginPrompter } from "../login";
import { SessionError, type Credentials, type ServerEndpoints, type Session, type SessionClient } from "../session";

interface ScriptedPrompter extends LoginPrompter {
  readonly questions: string[];
  readonly notices: string[];
}

const createPrompter = (answers: string[]): ScriptedPrompter => {
  const questions: string[] = [];
  const notices: string[] = [];
  const remaining = [...answers];
  return {
    questions,
    notices,
    ask: async (question) => {
      questions.push(question);
      const answer = remaining.shift();
      if (answer === undefined) {
        throw new Error(`No scripted answer for "${question}"`);
      }
      return answer;
    },
    notify: (message) => {
      notices.push(message);
    },
  };
};

const createFakeClient = (
  endpoints: ServerEndpoints,
  behaviour: {
    register?: (credentials: Credentials) => Promise<void>;
    login?: (credentials: Credentials) => Promise<Session>;
  } = {},
): SessionClient => ({
  endpoints,
  register: behaviour.register ?? (async () => undefined),
  login:
    behaviour.login ??
    (async () => ({
      userId: 42,
      token: "test-token",
      serverBaseUrl: endpoints.baseUrl,
      websocketUrl: endpoints.websocketUrl,
    })),
});

const defaults = { host: "127.0.0.1", port: 3000 };

describe("parseLoginAction", () => {
  it("defaults to login and accepts short and long forms", () => {
    expect(parseLoginAction("")).toBe("login");
    expect(parseLoginAction(" L ")).toBe("login");
    expect(parseLoginAction("register")).toBe("register");
    expect(parseLoginAction("q")).toBe("quit");
    expect(parseLoginAction("maybe")).toBeNull();
  });
});

describe("runLoginForm", () => {
  it("logs in against the default server", async () => {
    const prompter = createPrompter(["", "", "", "alice", "test-password"]);
    const createSessionClient = vi.fn((endpoints: ServerEndpoints) => createFakeClient(endpoints));

    const session = await runLoginForm({ prompter, defaults, createSessionClient });

    expect(createSessionClient).toHaveBeenCalledWith({
      baseUrl: "http://127.0.0.1:3000",
      websocketUrl: "ws://127.0.0.1:3000/api/ws",
    });
    expect(session?.userId).toBe(42);
    expect(prompter.questions).toEqual([
      "[l]ogin, [r]egister or [q]uit? ",
      "Server host [127.0.0.1]: ",
      "Server port [3000]: ",
      "Login: ",
      "Password: ",
    ]);
    expect(prompter.notices).toEqual(["Logged in as user 42."]);
  });

  it("uses the host and port the user typed", async () => {
    const prompter = createPrompter(["l", "game.local", "4000", "alice", "test-password"]);
    const createSessionClient = vi.fn((endpoints: ServerEndpoints) => createFakeClient(endpoints));

    const session = await runLoginForm({ prompter, defaults, createSessionClient });

    expect(session?.websocketUrl).toBe("ws://game.local:4000/api/ws");
  });

  it("returns to the menu after registering", async () => {
    const prompter = createPrompter(["r", "", "", "bob", "test-password", "l", "", "", "bob", "test-password"]);
    const register = vi.fn(async (_credentials: Credentials) => undefined);

    const session = await runLoginForm({
      prompter,
      defaults,
      createSessionClient: (endpoints) => createFakeClient(endpoints, { register }),
    });

    expect(register).toHaveBeenCalledWith({ login: "bob", password: "test-password" });
    expect(session).not.toBeNull();
    expect(prompter.notices).toEqual(["Registration succeeded. You can log in now.", "Logged in as user 42."]);
  });

  it("explains a failed login and lets the user quit", async () => {
    const prompter = createPrompter(["l", "", "", "alice", "wrong", "q"]);

    const session = await runLoginForm({
      prompter,
      defaults,
      createSessionClient: (endpoints) =>
        createFakeClient(endpoints, {
          login: async () => {
            throw new SessionError("rejected", "Login failed: invalid credentials");
          },
        }),
    });

    expect(session).toBeNull();
    expect(prompter.notices).toEqual(["Login failed: invalid credentials"]);
  });

  it("re-prompts for an invalid menu choice or port", async () => {
    const prompter = createPrompter(["x", "l", "", "99999", "alice", "test-password", "q"]);
    const createSessionClient = vi.fn((endpoints: ServerEndpoints) => createFakeClient(endpoints));

    const session = await runLoginForm({ prompter, defaults, createSessionClient });

    expect(session).toBeNull();
    expect(createSessionClient).not.toHaveBeenCalled();
    expect(prompter.notices).toEqual([
      "Please answer l, r or q.",
      "Server port must be between 1 and 65535, received 99999.",
    ]);
  });
});
