/**
 * Response body decoders. Each takes the parsed JSON value and throws when
 * the shape is wrong; the HTTP client turns that into DECODING_ERROR.
 */

import type {
  ChallengeResponse,
  ModelInfo,
  RegistrationResponse,
} from "@attested-chat/shared";

export type ResponseDecoder<T> = (value: unknown) => T;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Passthrough for callers that inspect the JSON themselves.
 */
export const decodeJson: ResponseDecoder<unknown> = (value) => value;

export const decodeChallenge: ResponseDecoder<ChallengeResponse> = (value) => {
  if (!isRecord(value) || typeof value.challenge !== "string" || value.challenge === "") {
    throw new Error("Challenge response is missing `challenge`");
  }
  return { challenge: value.challenge };
};

export const decodeRegistration: ResponseDecoder<RegistrationResponse> = (value) => {
  if (!isRecord(value) || typeof value.success !== "boolean") {
    throw new Error("Registration response is missing `success`");
  }
  return {
    success: value.success,
    deviceId: typeof value.deviceId === "string" ? value.deviceId : "",
  };
};

export const decodeModelList: ResponseDecoder<ModelInfo[]> = (value) => {
  if (!isRecord(value) || !Array.isArray(value.data)) {
    throw new Error("Model list response is missing `data`");
  }
  return value.data.map((entry, index) => {
    if (!isRecord(entry) || typeof entry.id !== "string") {
      throw new Error(`Model entry ${index} is missing \`id\``);
    }
    return {
      id: entry.id,
      object: typeof entry.object === "string" ? entry.object : "model",
      created: typeof entry.created === "number" ? entry.created : 0,
      owned_by: typeof entry.owned_by === "string" ? entry.owned_by : "",
    };
  });
};

export interface ChatCompletionMessage {
  role: string;
  content: string | null;
}

export interface ChatCompletionChoice {
  index: number;
  message: ChatCompletionMessage;
  finish_reason: string | null;
}

export interface ChatCompletionResponse {
  id: string;
  model: string;
  choices: ChatCompletionChoice[];
  raw: Record<string, unknown>;
}

export const decodeChatCompletion: ResponseDecoder<ChatCompletionResponse> = (value) => {
  if (!isRecord(value) || typeof value.id !== "string" || !Array.isArray(value.choices)) {
    throw new Error("Chat completion response is missing `id` or `choices`");
  }
  const choices = value.choices.map((choice, index): ChatCompletionChoice => {
    if (!isRecord(choice) || !isRecord(choice.message)) {
      throw new Error(`Choice ${index} is missing \`message\``);
    }
    const { role, content } = choice.message;
    return {
      index: typeof choice.index === "number" ? choice.index : index,
      message: {
        role: typeof role === "string" ? role : "assistant",
        content: typeof content === "string" ? content : null,
      },
      finish_reason: typeof choice.finish_reason === "string" ? choice.finish_reason : null,
    };
  });
  return {
    id: value.id,
    model: typeof value.model === "string" ? value.model : "",
    choices,
    raw: value,
  };
};
