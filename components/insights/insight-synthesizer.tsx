"use client";

import { useCallback, useState } from "react";
import { toast } from "sonner";
import { AlertCircle, Download, Loader2, Sparkles } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Label } from "@/components/ui/label";
import {
  Select,
  SelectContent,
  SelectItem,
  SelectTrigger,
  SelectValue,
} from "@/components/ui/select";
import { Slider } from "@/components/ui/slider";
import { FeedbackUpload } from "./feedback-upload";
import { DataPreview } from "./data-preview";
import { ThemeCard } from "./theme-card";
import { DEFAULT_ROWS, MAX_ROWS, MIN_ROWS } from "@/lib/insights/payload";
import { guessTextColumn, parseFeedbackCsv } from "@/lib/insights/table";
import type { AnalyzeResponse, FeedbackTable } from "@/lib/insights/types";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type Status = "idle" | "analyzing" | "done" | "error";

interface Analysis {
  column: string;
  response: AnalyzeResponse;
}

function errorMessage(data: unknown, fallback: string): string {
  if (typeof data === "object" && data !== null && "error" in data && typeof data.error === "string") {
    return data.error;
  }
  return fallback;
}

// ---------------------------------------------------------------------------
// Main component
// ---------------------------------------------------------------------------

export function InsightSynthesizer() {
  const [fileName, setFileName] = useState<string | null>(null);
  const [table, setTable] = useState<FeedbackTable | null>(null);
  const [column, setColumn] = useState("");
  const [maxRows, setMaxRows] = useState(DEFAULT_ROWS);
  const [status, setStatus] = useState<Status>("idle");
  const [error, setError] = useState<string | null>(null);
  const [analysis, setAnalysis] = useState<Analysis | null>(null);

  const handleFileText = useCallback((name: string, text: string) => {
    setAnalysis(null);
    setStatus("idle");
    try {
      const parsed = parseFeedbackCsv(text);
      setTable(parsed);
      setFileName(name);
      setColumn(guessTextColumn(parsed));
      setError(null);
    } catch (err) {
      setTable(null);
      setFileName(null);
      setError(err instanceof Error ? err.message : "Failed to parse the CSV file");
    }
  }, []);

  const handleUploadError = useCallback((message: string) => {
    setError(message);
  }, []);

  // -------------------------------------------------------------------------
  // Analyze
  // -------------------------------------------------------------------------

  async function handleAnalyze() {
    if (!table || !column) return;
    setStatus("analyzing");
    setError(null);
    setAnalysis(null);

    try {
      const res = await fetch("/api/analyze", {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          columns: table.columns,
          rows: table.rows.slice(0, maxRows),
          column,
          maxRows,
        }),
      });

      if (!res.ok) {
        const data: unknown = await res.json().catch(() => null);
        setError(errorMessage(data, `Analysis failed (${res.status})`));
        setStatus("error");
        return;
      }

      const response: AnalyzeResponse = await res.json();
      setAnalysis({ column, response });
      setStatus("done");
      toast.success("Done");
    } catch (err) {
      setError(err instanceof Error ? err.message : "Failed to reach the analyze endpoint");
      setStatus("error");
    }
  }

  // -------------------------------------------------------------------------
  // Export
  // -------------------------------------------------------------------------

  function handleDownload() {
    if (!analysis) return;
    const blob = new Blob([analysis.response.markdown], { type: "text/markdown;charset=utf-8" });
    const url = URL.createObjectURL(blob);
    const a = document.createElement("a");
    a.href = url;
    a.download = analysis.response.fileName;
    document.body.appendChild(a);
    a.click();
    document.body.removeChild(a);
    URL.revokeObjectURL(url);
  }

  const analyzing = status === "analyzing";

  return (
    <div className="space-y-6">
      <FeedbackUpload fileName={fileName} onFileText={handleFileText} onError={handleUploadError} />

      {error && (
        <div
          role="alert"
          className="flex items-start gap-2 rounded-md border border-destructive/50 bg-destructive/10 p-3 text-sm text-destructive"
        >
          <AlertCircle className="mt-0.5 h-4 w-4 shrink-0" />
          <span>{error}</span>
        </div>
      )}

      {!table && <p className="text-sm text-muted-foreground">Upload a CSV to begin.</p>}

      {table && (
        <>
          <DataPreview table={table} />

          <Card>
            <CardHeader>
              <CardTitle>Analysis settings</CardTitle>
            </CardHeader>
            <CardContent className="space-y-6">
              <div className="space-y-2">
                <Label htmlFor="text-column">Which column contains the customer feedback text?</Label>
                <Select value={column} onValueChange={setColumn} disabled={analyzing}>
                  <SelectTrigger id="text-column" className="max-w-md">
                    <SelectValue placeholder="Select a column" />
                  </SelectTrigger>
                  <SelectContent>
                    {table.columns.map((c) => (
                      <SelectItem key={c} value={c}>
                        {c}
                      </SelectItem>
                    ))}
                  </SelectContent>
                </Select>
              </div>

              <div className="max-w-md space-y-3">
                <Label>How many rows to analyze (start small): {maxRows}</Label>
                <Slider
                  min={MIN_ROWS}
                  max={MAX_ROWS}
                  step={1}
                  value={[maxRows]}
                  onValueChange={(values) => setMaxRows(values[0] ?? DEFAULT_ROWS)}
                  disabled={analyzing}
                />
              </div>

              <Button onClick={() => void handleAnalyze()} disabled={analyzing || !column}>
                {analyzing ? <Loader2 className="animate-spin" /> : <Sparkles />}
                {analyzing ? "Analyzing..." : "Analyze with AI"}
              </Button>
            </CardContent>
          </Card>
        </>
      )}

      {analysis && (
        <section className="space-y-4">
          <div className="flex items-center justify-between">
            <h2 className="text-xl font-semibold">Themes</h2>
            <Button variant="outline" onClick={handleDownload}>
              <Download />
              Download Markdown Report
            </Button>
          </div>
          {analysis.response.cards.map((card, i) => (
            <ThemeCard key={`${card.theme}-${i}`} card={card} column={analysis.column} />
          ))}
        </section>
      )}
    </div>
  );
}
