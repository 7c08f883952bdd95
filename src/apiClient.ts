import axios from "axios";
import { ClassificationResult } from "./types";

export interface HealthResponse {
  status: string;
  timestamp: string;
}

export interface FeedbackClient {
  checkFeedback(text: string, options?: { debug?: boolean }): Promise<ClassificationResult>;
  health(): Promise<HealthResponse>;
}

export const createFeedbackClient = (baseURL: string, timeoutMs = 10000): FeedbackClient => {
  const client = axios.create({ baseURL, timeout: timeoutMs });

  return {
    checkFeedback: async (text, options = {}) => {
      const { data } = await client.post<ClassificationResult>(
        "/check_feedback",
        { text },
        { params: options.debug ? { debug: "true" } : undefined },
      );
      return data;
    },
    health: async () => {
      const { data } = await client.get<HealthResponse>("/health");
      return data;
    },
  };
};
