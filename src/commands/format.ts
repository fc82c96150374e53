import chalk from "chalk";
import { extractValue, parseJson } from "../lib/fields.js";

export const DESCRIPTION_LIMIT = 500;

/** Cuts at `maxLength` code points, so surrogate pairs stay whole. */
export function trimText(text: string, maxLength = 200): string {
  const codePoints = Array.from(text);
  return codePoints.length > maxLength ? `${codePoints.slice(0, maxLength).join("")}...` : text;
}

/** Pretty JSON for --raw; bodies that are not JSON are returned untouched. */
export function formatRawJson(body: string): string {
  const document = parseJson(body);
  return document === undefined ? body : JSON.stringify(document, null, 2);
}

export function formatIssue(body: string): string[] {
  const issue = parseJson(body);
  const field = (path: string) => extractValue(issue, path);

  const storyPoints = field(".fields.customfield_10016");
  const description = field(".renderedFields.description // .fields.description");

  const lines = [
    chalk.bold("📋 JIRA Issue Details"),
    "===================",
    "",
    `🔑 Key:          ${field(".key")}`,
    `📝 Summary:      ${field(".fields.summary")}`,
    `📊 Status:       ${field(".fields.status.name")}`,
    `📋 Type:         ${field(".fields.issuetype.name")}`,
    `⚡ Priority:     ${field(".fields.priority.name")}`,
    `👤 Assignee:     ${field(".fields.assignee.displayName")}`,
    `📧 Reporter:     ${field(".fields.reporter.displayName")}`,
  ];

  if (storyPoints !== "N/A") {
    lines.push(`📈 Story Points: ${storyPoints}`);
  }

  lines.push(`📅 Created:      ${field(".fields.created")}`, `🔄 Updated:      ${field(".fields.updated")}`, "");

  if (description !== "N/A") {
    lines.push(chalk.bold("📄 Description:"), "---------------", trimText(description, DESCRIPTION_LIMIT), "");
  }

  return lines;
}

/** Short block printed after a status change or worklog. */
export function formatIssueSummary(key: string, body: string): string[] {
  const issue = parseJson(body);
  return [
    chalk.bold("📋 Issue Summary:"),
    `🔑 Key:     ${key}`,
    `📝 Title:   ${extractValue(issue, ".fields.summary")}`,
    `📊 Status:  ${extractValue(issue, ".fields.status.name")}`,
  ];
}
