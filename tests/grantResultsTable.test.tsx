// @vitest-environment jsdom
import React from "react";
import { afterEach, describe, expect, it, vi } from "vitest";
import { cleanup, fireEvent, render, screen } from "@testing-library/react";
import GrantResultsTable, { EMPTY_MESSAGES } from "../components/GrantResultsTable";
import { GrantSearchResult, RunTrace } from "../types";

const TODAY = new Date(2026, 9, 19, 12, 0);

const trace: RunTrace = {
  runId: 3,
  configHash: "hash",
  completionModel: "gemini-2.5-flash",
  embeddingModel: "gemini-embedding-001",
  startedAt: "2026-10-19T09:29:00.000Z",
  finishedAt: "2026-10-19T09:30:00.000Z",
  candidateCount: 15,
  retries: 2,
  cacheHit: true,
};

const result: GrantSearchResult = {
  status: "ready",
  trace,
  grants: [
    {
      title: "College Access Challenge",
      sponsor: "Access Fund",
      summary: "Funds college access programs.",
      deadline: "rolling",
      url: "https://grants.example.org/cac",
      amount: "$50,000",
      similarity: 0.91234,
      feasibility: "High",
      rationale: "Funds college access.",
    },
    {
      title: "Community Arts Fund",
      sponsor: "",
      summary: "Supports community murals.",
      deadline: "2026-01-15",
      url: "",
      similarity: 0.25,
      feasibility: "Unknown",
      rationale: "parse error",
    },
  ],
};

describe("GrantResultsTable", () => {
  afterEach(() => {
    cleanup();
  });

  it("renders one row per grant in ranked order", () => {
    render(<GrantResultsTable result={result} today={TODAY} />);

    const rows = screen.getAllByRole("row");
    expect(rows).toHaveLength(3);
    expect(screen.getAllByRole("columnheader").map(header => header.textContent)).toEqual([
      "#",
      "Title",
      "Sponsor",
      "Amount",
      "Similarity",
      "Feasibility",
      "Why it fits",
      "Deadline",
      "URL",
    ]);
    expect(rows[1]).toHaveTextContent("College Access Challenge");
    expect(rows[2]).toHaveTextContent("Community Arts Fund");
    expect(screen.getByText("0.912")).toHaveAttribute("title", "91.2% match");
    expect(screen.getByText("parse error")).toBeInTheDocument();
    expect(screen.getByText("Passed")).toBeInTheDocument();
    expect(screen.getByRole("link", { name: "Open" })).toHaveAttribute("href", "https://grants.example.org/cac");
    expect(screen.getByText("$50,000")).toBeInTheDocument();
    expect(screen.getAllByText("N/A")).toHaveLength(3);
  });

  it("shows the run trace under technical details", () => {
    render(<GrantResultsTable result={result} today={TODAY} />);

    expect(screen.getByText("Technical Details")).toBeInTheDocument();
    expect(screen.getByText("#3", { exact: false })).toBeInTheDocument();
    expect(screen.getByText("Cached Generation:").parentElement).toHaveTextContent("Cached Generation: Yes");
  });

  it("offers the report download only when a handler is given", () => {
    const onDownloadReport = vi.fn();
    render(<GrantResultsTable result={result} today={TODAY} onDownloadReport={onDownloadReport} />);

    fireEvent.click(screen.getByRole("button", { name: "Download .docx" }));
    expect(onDownloadReport).toHaveBeenCalledTimes(1);

    cleanup();
    render(<GrantResultsTable result={result} today={TODAY} />);
    expect(screen.queryByRole("button", { name: "Download .docx" })).not.toBeInTheDocument();
  });

  it("distinguishes an unparseable response from an empty list", () => {
    render(<GrantResultsTable result={{ status: "empty", reason: "parse_error", grants: [], trace }} />);
    expect(screen.getByRole("status")).toHaveTextContent(EMPTY_MESSAGES.parse_error);
    expect(screen.queryByRole("table")).not.toBeInTheDocument();

    cleanup();
    render(<GrantResultsTable result={{ status: "empty", reason: "no_grants", grants: [], trace }} />);
    expect(screen.getByRole("status")).toHaveTextContent(EMPTY_MESSAGES.no_grants);
  });
});
