import type { ResponseCreateParamsNonStreaming } from "openai/resources/responses/responses";

interface DescriberInput {
  prompt: string;
  model: string;
}

interface DescriberResponse {
  output_text: string;
  status?: string | null;
  error?: { code: string; message: string } | null;
}

// The slice of the OpenAI client the describer calls.
interface ResponsesClient {
  responses: {
    create: (body: ResponseCreateParamsNonStreaming) => Promise<DescriberResponse>;
  };
}

interface DescriberAgentOptions {
  apiKey: string;
  baseUrl?: string;
  client?: ResponsesClient;
}

interface DescriberAgent {
  describe: (input: DescriberInput) => Promise<string>;
}

export type {
  DescriberAgent,
  DescriberAgentOptions,
  DescriberInput,
  DescriberResponse,
  ResponsesClient,
};
