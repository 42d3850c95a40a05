import { describe, expect, it, vi } from "vitest";
import { IrcLineDecoder } from "../src/lineDecoder";

describe("IrcLineDecoder", () => {
  it("emits decoded messages", () => {
    const decoder = new IrcLineDecoder();
    const onMessage = vi.fn();
    decoder.onMessage(onMessage);

    const result = decoder.push(":nick!user@host JOIN #lobby\r\n");

    expect(result.ok).toBe(true);
    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage).toHaveBeenCalledWith({
      prefix: { kind: "user", nick: "nick", user: "user", host: "host" },
      command: { kind: "named", name: "JOIN" },
      params: ["#lobby"]
    });
  });

  it("emits and logs rejected lines", () => {
    const logger = vi.fn();
    const decoder = new IrcLineDecoder({ logger });
    const onMessage = vi.fn();
    const onError = vi.fn();
    decoder.onMessage(onMessage);
    decoder.onError(onError);

    const result = decoder.push("PING");

    expect(result.ok).toBe(false);
    expect(onMessage).not.toHaveBeenCalled();
    expect(onError).toHaveBeenCalledTimes(1);
    expect(onError.mock.calls[0]?.[0]).toMatchObject({ kind: "incomplete", offset: 0 });
    expect(onError.mock.calls[0]?.[1]).toBe("PING");
    expect(logger).toHaveBeenCalledWith('Dropped IRC line (incomplete): Line terminator not found at offset 0: "PING"');
  });

  it("stops delivering after a handler is removed", () => {
    const decoder = new IrcLineDecoder();
    const onMessage = vi.fn();
    decoder.onMessage(onMessage);
    decoder.push("PING :a\r");
    decoder.offMessage(onMessage);
    decoder.push("PING :b\r");

    expect(onMessage).toHaveBeenCalledTimes(1);
    expect(onMessage.mock.calls[0]?.[0]).toEqual({ command: { kind: "named", name: "PING" }, params: ["a"] });
  });

  it("does not log successful lines", () => {
    const logger = vi.fn();
    const decoder = new IrcLineDecoder({ logger });
    decoder.push("PONG :irc.example.net\r\n");
    expect(logger).not.toHaveBeenCalled();
  });
});
