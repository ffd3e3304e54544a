"use client";

import { useCallback, useRef, useState, type ChangeEvent, type DragEvent } from "react";
import { Upload, FileText } from "lucide-react";
import { Button } from "@/components/ui/button";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";

interface FeedbackUploadProps {
  fileName: string | null;
  onFileText: (fileName: string, text: string) => void;
  onError: (message: string) => void;
}

export function FeedbackUpload({ fileName, onFileText, onError }: FeedbackUploadProps) {
  const fileInputRef = useRef<HTMLInputElement>(null);
  const [dragging, setDragging] = useState(false);

  const readFile = useCallback(
    (file: File) => {
      if (!file.name.toLowerCase().endsWith(".csv")) {
        onError("Please upload a CSV (.csv) file.");
        return;
      }
      file
        .text()
        .then((text) => onFileText(file.name, text))
        .catch((err: unknown) =>
          onError(err instanceof Error ? err.message : "Failed to read the file")
        );
    },
    [onFileText, onError]
  );

  const handleDrop = useCallback(
    (e: DragEvent) => {
      e.preventDefault();
      e.stopPropagation();
      setDragging(false);
      const file = e.dataTransfer.files[0];
      if (file) readFile(file);
    },
    [readFile]
  );

  const handleSelect = useCallback(
    (e: ChangeEvent<HTMLInputElement>) => {
      const file = e.target.files?.[0];
      if (file) readFile(file);
      e.target.value = "";
    },
    [readFile]
  );

  return (
    <Card>
      <CardHeader>
        <CardTitle>Upload a CSV file</CardTitle>
        <CardDescription>One row per piece of feedback, with a header row.</CardDescription>
      </CardHeader>
      <CardContent>
        <div
          onDragOver={(e) => {
            e.preventDefault();
            setDragging(true);
          }}
          onDragLeave={() => setDragging(false)}
          onDrop={handleDrop}
          className={`flex flex-col items-center justify-center gap-3 rounded-lg border-2 border-dashed p-8 text-center transition-colors ${
            dragging ? "border-primary bg-primary/5" : "border-muted-foreground/25"
          }`}
        >
          {fileName ? (
            <FileText className="h-8 w-8 text-primary" />
          ) : (
            <Upload className="h-8 w-8 text-muted-foreground" />
          )}
          <p className="text-sm text-muted-foreground">
            {fileName ?? "Drag and drop a .csv file here, or"}
          </p>
          <Button variant="outline" size="sm" onClick={() => fileInputRef.current?.click()}>
            {fileName ? "Choose another file" : "Browse files"}
          </Button>
          <input
            ref={fileInputRef}
            type="file"
            accept=".csv,text/csv"
            className="hidden"
            onChange={handleSelect}
          />
        </div>
      </CardContent>
    </Card>
  );
}
