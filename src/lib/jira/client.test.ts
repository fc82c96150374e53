import { describe, it, expect } from "vitest";
import { normalizeKey } from "../issue-key.js";
import type { ApiRequest, ApiResponse, Transport } from "../transport/types.js";
import { JiraClient } from "./client.js";

class RecordingTransport implements Transport {
  requests: ApiRequest[] = [];

  constructor(private response: ApiResponse) {}

  async send(request: ApiRequest): Promise<ApiResponse> {
    this.requests.push(request);
    return this.response;
  }
}

const key = normalizeKey("PROJ-42");

describe("JiraClient", () => {
  it("should read issues from API version 3", async () => {
    const transport = new RecordingTransport({ status: 200, body: '{"key":"PROJ-42"}' });
    const client = new JiraClient(transport);

    await expect(client.getIssue(key, { renderedFields: true })).resolves.toBe('{"key":"PROJ-42"}');
    await client.getIssue(key);

    expect(transport.requests).toEqual([
      { method: "GET", endpoint: "issue/PROJ-42?expand=renderedFields", apiVersion: "3" },
      { method: "GET", endpoint: "issue/PROJ-42", apiVersion: "3" },
    ]);
  });

  it("should decode transitions", async () => {
    const transport = new RecordingTransport({
      status: 200,
      body: '{"transitions":[{"id":"5","name":"Finish","to":{"name":"Done"}}]}',
    });

    await expect(new JiraClient(transport).getTransitions(key)).resolves.toEqual([{ id: "5", name: "Done" }]);
    expect(transport.requests[0]?.endpoint).toBe("issue/PROJ-42/transitions");
  });

  it("should name the endpoint when the transitions body is not a list", async () => {
    const transport = new RecordingTransport({ status: 200, body: '{"errorMessages":[]}' });

    await expect(new JiraClient(transport).getTransitions(key)).rejects.toMatchObject({
      detail: {
        kind: "InvalidResponse",
        endpoint: "issue/PROJ-42/transitions",
        message: "expected a transitions list",
      },
    });
  });

  it("should submit transitions by id", async () => {
    const transport = new RecordingTransport({ status: 204, body: "" });

    await new JiraClient(transport).transitionIssue(key, "21");

    expect(transport.requests).toEqual([
      {
        method: "POST",
        endpoint: "issue/PROJ-42/transitions",
        body: { transition: { id: "21" } },
        apiVersion: "3",
      },
    ]);
  });

  it("should wrap comments in a document", async () => {
    const transport = new RecordingTransport({ status: 201, body: '{"id":"900"}' });

    await expect(new JiraClient(transport).addComment(key, "Looks good")).resolves.toEqual({ id: "900" });

    expect(transport.requests[0]).toEqual({
      method: "POST",
      endpoint: "issue/PROJ-42/comment",
      body: {
        body: {
          type: "doc",
          version: 1,
          content: [{ type: "paragraph", content: [{ type: "text", text: "Looks good" }] }],
        },
      },
      apiVersion: "3",
    });
  });

  it("should post worklogs in seconds", async () => {
    const transport = new RecordingTransport({ status: 201, body: '{"id":"77"}' });

    await new JiraClient(transport).addWorklog(key, 9000, "Pairing");

    expect(transport.requests[0]?.body).toEqual({
      timeSpentSeconds: 9000,
      comment: {
        type: "doc",
        version: 1,
        content: [{ type: "paragraph", content: [{ type: "text", text: "Pairing" }] }],
      },
    });
  });

  it("should turn error statuses into HTTPError", async () => {
    const transport = new RecordingTransport({ status: 403, body: "" });

    await expect(new JiraClient(transport).getIssue(key)).rejects.toMatchObject({
      detail: { kind: "HTTPError", status: 403, message: "Forbidden: Insufficient permissions for this operation" },
    });
  });
});
