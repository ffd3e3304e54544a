import { KeyRound } from "lucide-react";
import { Card, CardContent, CardDescription, CardHeader, CardTitle } from "@/components/ui/card";

/**
 * Shown instead of the analyzer when the server has no model credential.
 */
export function ConfigurationNotice({ message }: { message: string }) {
  return (
    <Card className="max-w-2xl border-destructive/50">
      <CardHeader>
        <div className="mb-2 flex h-10 w-10 items-center justify-center rounded-full bg-destructive/10">
          <KeyRound className="h-5 w-5 text-destructive" />
        </div>
        <CardTitle>Configuration required</CardTitle>
        <CardDescription>The app cannot analyze feedback until this is fixed.</CardDescription>
      </CardHeader>
      <CardContent>
        <p role="alert" className="rounded-md bg-muted p-3 font-mono text-sm">
          {message}
        </p>
      </CardContent>
    </Card>
  );
}
