import OpenAI from "openai";
import { z } from "zod";
import { ApiError, DescribeError } from "../../core/errors";
import type {
  DescriberAgent,
  DescriberAgentOptions,
  DescriberInput,
  ResponsesClient,
} from "./describer.types";

const describerInputSchema = z.object({
  prompt: z.string().min(1),
  model: z.string().min(1),
});

const toApiError = (error: unknown): ApiError => {
  // Timeouts are a subclass of connection errors.
  if (error instanceof OpenAI.APIConnectionError) {
    return new ApiError(
      "transport",
      `Could not reach the OpenAI API: ${error.message}`,
      undefined,
      { cause: error }
    );
  }
  if (error instanceof OpenAI.APIError) {
    const status = error.status;
    if (status === 401 || status === 403) {
      return new ApiError(
        "authentication",
        `OpenAI rejected the API key: ${error.message}`,
        status,
        { cause: error }
      );
    }
    if (status === 429 && error.code === "insufficient_quota") {
      return new ApiError(
        "quota",
        `OpenAI quota exceeded: ${error.message}`,
        status,
        { cause: error }
      );
    }
    if (status === 429) {
      return new ApiError(
        "rate_limit",
        `OpenAI rate limit reached: ${error.message}`,
        status,
        { cause: error }
      );
    }
    if (status !== undefined && status >= 500) {
      return new ApiError(
        "server",
        `OpenAI server error: ${error.message}`,
        status,
        { cause: error }
      );
    }
    if (status !== undefined) {
      return new ApiError(
        "request",
        `OpenAI rejected the request: ${error.message}`,
        status,
        { cause: error }
      );
    }
    return new ApiError("transport", `OpenAI request failed: ${error.message}`, undefined, {
      cause: error,
    });
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ApiError("transport", `OpenAI request failed: ${message}`, undefined, {
    cause: error,
  });
};

const createDescriberAgent = (options: DescriberAgentOptions): DescriberAgent => {
  const client: ResponsesClient =
    options.client ??
    new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseUrl,
      maxRetries: 0,
    });

  const describe = async (rawInput: DescriberInput): Promise<string> => {
    const input = describerInputSchema.parse(rawInput);

    const response = await client.responses
      .create({
        model: input.model,
        input: [{ role: "user", content: input.prompt }],
      })
      .catch((error: unknown) => {
        throw error instanceof DescribeError ? error : toApiError(error);
      });

    if (response.error) {
      throw new ApiError(
        "response",
        `OpenAI response failed (${response.error.code}): ${response.error.message}`
      );
    }
    if (response.status === "failed") {
      throw new ApiError("response", "OpenAI response failed without details.");
    }

    return response.output_text;
  };

  return { describe };
};

export { createDescriberAgent, toApiError };
export type { DescriberAgent, DescriberInput };
