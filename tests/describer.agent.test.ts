import { createServer } from "node:http";
import type { AddressInfo } from "node:net";
import OpenAI from "openai";
import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createDescriberAgent, toApiError } from "../agents/describer/describer.agent";
import type { DescriberResponse } from "../agents/describer/describer.types";
import { ApiError } from "../core/errors";

const createClient = (respond: () => Promise<DescriberResponse>) => {
  const create = vi.fn((_body: ResponseCreateParamsNonStreaming) => respond());
  return { client: { responses: { create } }, create };
};

const createAgent = (respond: () => Promise<DescriberResponse>) => {
  const { client, create } = createClient(respond);
  const agent = createDescriberAgent({ apiKey: "test-secret", client });
  return { agent, create };
};

const rejection = async (promise: Promise<unknown>) => {
  const error = await promise.catch((caught: unknown) => caught);
  if (!(error instanceof ApiError)) {
    throw new Error(`Expected an ApiError, got ${String(error)}`);
  }
  return error;
};

describe("createDescriberAgent", () => {
  it("sends the prompt as one user message and returns the output text", async () => {
    const { agent, create } = createAgent(async () => ({
      output_text: "## Description\nAdds a line.",
      status: "completed",
      error: null,
    }));

    const text = await agent.describe({ prompt: "the prompt", model: "gpt-4" });

    expect(text).toBe("## Description\nAdds a line.");
    expect(create).toHaveBeenCalledTimes(1);
    expect(create).toHaveBeenCalledWith({
      model: "gpt-4",
      input: [{ role: "user", content: "the prompt" }],
    });
  });

  it("returns the text untouched, surrounding whitespace included", async () => {
    const { agent } = createAgent(async () => ({
      output_text: "\n## Description\n\n",
    }));

    await expect(
      agent.describe({ prompt: "the prompt", model: "gpt-4" })
    ).resolves.toBe("\n## Description\n\n");
  });

  it("turns a failed response into a response ApiError", async () => {
    const { agent } = createAgent(async () => ({
      output_text: "",
      status: "failed",
      error: { code: "server_error", message: "The model crashed." },
    }));

    const error = await rejection(
      agent.describe({ prompt: "the prompt", model: "gpt-4" })
    );

    expect(error.kind).toBe("response");
    expect(error.message).toBe(
      "OpenAI response failed (server_error): The model crashed."
    );
  });

  it("maps client errors through toApiError", async () => {
    const { agent } = createAgent(async () => {
      throw new OpenAI.AuthenticationError(
        401,
        { message: "Incorrect API key provided" },
        undefined,
        undefined
      );
    });

    const error = await rejection(
      agent.describe({ prompt: "the prompt", model: "gpt-4" })
    );

    expect(error.kind).toBe("authentication");
    expect(error.status).toBe(401);
    expect(error.message).toBe(
      "OpenAI rejected the API key: 401 Incorrect API key provided"
    );
  });

  it("validates its input before calling the API", async () => {
    const { agent, create } = createAgent(async () => ({ output_text: "x" }));

    await expect(agent.describe({ prompt: "", model: "gpt-4" })).rejects.toThrow();
    expect(create).not.toHaveBeenCalled();
  });
});

describe("createDescriberAgent with the SDK client", () => {
  const servers: ReturnType<typeof createServer>[] = [];

  afterEach(async () => {
    await Promise.all(
      servers.splice(0).map(
        (server) =>
          new Promise<void>((resolve) => {
            server.close(() => resolve());
            server.closeAllConnections();
          })
      )
    );
  });

  const startFailingServer = async () => {
    const hits: string[] = [];
    const server = createServer((request, response) => {
      hits.push(`${request.method} ${request.url}`);
      request.resume();
      response.writeHead(500, {
        "content-type": "application/json",
        connection: "close",
      });
      response.end(JSON.stringify({ error: { message: "upstream down" } }));
    });
    servers.push(server);
    await new Promise<void>((resolve) => {
      server.listen(0, "127.0.0.1", () => resolve());
    });
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("Server did not bind to a port.");
    }
    return { hits, baseUrl: `http://127.0.0.1:${address.port}/v1` };
  };

  it("sends a failing request once, without retrying", async () => {
    const { hits, baseUrl } = await startFailingServer();
    const agent = createDescriberAgent({ apiKey: "test-secret", baseUrl });

    const error = await rejection(
      agent.describe({ prompt: "the prompt", model: "gpt-4" })
    );

    expect(error.kind).toBe("server");
    expect(error.status).toBe(500);
    expect(error.message).toBe("OpenAI server error: 500 upstream down");
    expect(hits).toEqual(["POST /v1/responses"]);
  });
});

describe("toApiError", () => {
  it("separates exhausted quota from rate limiting", () => {
    const quota = toApiError(
      new OpenAI.RateLimitError(
        429,
        { code: "insufficient_quota", message: "You exceeded your current quota" },
        undefined,
        undefined
      )
    );
    const limited = toApiError(
      new OpenAI.RateLimitError(
        429,
        { code: "rate_limit_exceeded", message: "Rate limit reached" },
        undefined,
        undefined
      )
    );

    expect(quota.kind).toBe("quota");
    expect(quota.message).toBe(
      "OpenAI quota exceeded: 429 You exceeded your current quota"
    );
    expect(limited.kind).toBe("rate_limit");
  });

  it("classifies server and request errors by status", () => {
    const server = toApiError(
      new OpenAI.InternalServerError(500, { message: "boom" }, undefined, undefined)
    );
    const request = toApiError(
      new OpenAI.BadRequestError(
        400,
        { message: "This model's maximum context length is 8192 tokens." },
        undefined,
        undefined
      )
    );

    expect(server.kind).toBe("server");
    expect(server.status).toBe(500);
    expect(request.kind).toBe("request");
    expect(request.message).toBe(
      "OpenAI rejected the request: 400 This model's maximum context length is 8192 tokens."
    );
  });

  it("treats permission errors as authentication failures", () => {
    const error = toApiError(
      new OpenAI.PermissionDeniedError(403, { message: "Forbidden" }, undefined, undefined)
    );

    expect(error.kind).toBe("authentication");
  });

  it("treats connection failures and timeouts as transport errors", () => {
    const connection = toApiError(
      new OpenAI.APIConnectionError({ message: "Connection error." })
    );
    const timeout = toApiError(new OpenAI.APIConnectionTimeoutError());

    expect(connection.kind).toBe("transport");
    expect(connection.message).toBe(
      "Could not reach the OpenAI API: Connection error."
    );
    expect(timeout.kind).toBe("transport");
  });

  it("keeps the detail of errors from outside the SDK", () => {
    const error = toApiError(new Error("socket hang up"));

    expect(error.kind).toBe("transport");
    expect(error.message).toBe("OpenAI request failed: socket hang up");
    expect(error.cause).toBeInstanceOf(Error);
  });
});
