import { Badge } from "@/components/ui/badge";
import { Card, CardContent, CardHeader, CardTitle } from "@/components/ui/card";
import { Table, TableBody, TableCell, TableHead, TableHeader, TableRow } from "@/components/ui/table";
import type { Level, ThemeCard as ThemeCardData } from "@/lib/insights/types";

const LEVEL_VARIANT: Record<Level, "secondary" | "outline" | "destructive"> = {
  Low: "outline",
  Medium: "secondary",
  High: "destructive",
};

interface ThemeCardProps {
  card: ThemeCardData;
  column: string;
}

export function ThemeCard({ card, column }: ThemeCardProps) {
  return (
    <Card>
      <CardHeader>
        <CardTitle className="text-lg">{card.heading}</CardTitle>
        <div className="flex gap-2">
          <Badge variant={LEVEL_VARIANT[card.frequency]}>Frequency: {card.frequency}</Badge>
          <Badge variant={LEVEL_VARIANT[card.severity]}>Severity: {card.severity}</Badge>
        </div>
      </CardHeader>
      <CardContent className="space-y-4">
        <p className="text-sm">{card.summary}</p>
        <p className="text-sm">
          <span className="font-semibold">Recommended action:</span> {card.recommended_action}
        </p>
        <div>
          <p className="mb-2 text-sm font-semibold">Citations:</p>
          <div className="rounded-md border">
            <Table>
              <TableHeader>
                <TableRow>
                  <TableHead className="w-20">row_id</TableHead>
                  <TableHead>{column}</TableHead>
                </TableRow>
              </TableHeader>
              <TableBody>
                {card.citations.map((c, i) => (
                  <TableRow key={`${c.row_id}-${i}`}>
                    <TableCell className="font-mono text-xs">{c.row_id}</TableCell>
                    <TableCell className="whitespace-pre-wrap">{c.text}</TableCell>
                  </TableRow>
                ))}
              </TableBody>
            </Table>
          </div>
        </div>
      </CardContent>
    </Card>
  );
}
