import { buildSummaryPrompt, LlmSummarizer } from "../../enrichment/summarizer";
import type { CompletionClient, CompletionRequest } from "../../enrichment/types";

function fakeClient(answer: string) {
  const requests: CompletionRequest[] = [];
  const client: CompletionClient = {
    model: "test-model",
    complete: async (request) => {
      requests.push(request);
      return answer;
    },
  };
  return { client, requests };
}

describe("[Enrichment] Summarizer", () => {
  test("should fill in the prompt and mark truncated content", () => {
    const prompt = buildSummaryPrompt(
      { content: "abcdefghij", title: "Alphabet", url: "https://abc.test" },
      4,
    );

    expect(prompt).toContain("Title: Alphabet\nURL: https://abc.test\nUser's note: None provided");
    expect(prompt).toContain("Content:\nabcd...\n\nSummary:");
  });

  test("should leave short content whole and name missing fields", () => {
    const prompt = buildSummaryPrompt({ content: "short" });

    expect(prompt).toContain("Title: Unknown\nURL: Unknown");
    expect(prompt).toContain("Content:\nshort\n\nSummary:");
  });

  test("should return the model answer and record the model name", async () => {
    const { client, requests } = fakeClient("A short guide to comptime.");
    const summarizer = new LlmSummarizer(client, 120);

    await expect(summarizer.summarize({ content: "Zig has comptime" })).resolves.toBe(
      "A short guide to comptime.",
    );
    expect(summarizer.modelName).toBe("test-model");
    expect(requests).toHaveLength(1);
    expect(requests[0].maxTokens).toBe(120);
  });

  test("should fail on an empty answer", async () => {
    const { client } = fakeClient("");

    await expect(new LlmSummarizer(client).summarize({ content: "text" })).rejects.toThrow(
      "Empty summary from test-model",
    );
  });
});
