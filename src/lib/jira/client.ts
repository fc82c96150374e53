/**
 * Jira REST operations used by the commands, on top of a Transport
 */

import type { IssueKey } from "../issue-key.js";
import { parseJson } from "../fields.js";
import { parseTransitions, type Transition } from "../transitions.js";
import { ensureSuccess, type ApiRequest, type Transport } from "../transport/index.js";
import { textDocument } from "./document.js";

export class JiraClient {
  private transport: Transport;

  constructor(transport: Transport) {
    this.transport = transport;
  }

  /** Sends one request and returns the body text of a successful response. */
  async request(request: ApiRequest): Promise<string> {
    const response = await this.transport.send(request);
    return ensureSuccess(response);
  }

  /** Body of GET issue/<key>, as text so it can be printed raw. */
  async getIssue(key: IssueKey, options: { renderedFields?: boolean } = {}): Promise<string> {
    const query = options.renderedFields ? "?expand=renderedFields" : "";
    return this.request({ method: "GET", endpoint: `issue/${key}${query}`, apiVersion: "3" });
  }

  async getTransitions(key: IssueKey): Promise<Transition[]> {
    const endpoint = `issue/${key}/transitions`;
    const body = await this.request({ method: "GET", endpoint, apiVersion: "3" });
    return parseTransitions(body, endpoint);
  }

  async transitionIssue(key: IssueKey, transitionId: string): Promise<void> {
    await this.request({
      method: "POST",
      endpoint: `issue/${key}/transitions`,
      body: { transition: { id: transitionId } },
      apiVersion: "3",
    });
  }

  async addComment(key: IssueKey, text: string): Promise<unknown> {
    const body = await this.request({
      method: "POST",
      endpoint: `issue/${key}/comment`,
      body: { body: textDocument(text) },
      apiVersion: "3",
    });
    return parseJson(body);
  }

  async addWorklog(key: IssueKey, timeSpentSeconds: number, description: string): Promise<unknown> {
    const body = await this.request({
      method: "POST",
      endpoint: `issue/${key}/worklog`,
      body: { timeSpentSeconds, comment: textDocument(description) },
      apiVersion: "3",
    });
    return parseJson(body);
  }
}
