import { ConfigurationNotice } from "@/components/insights/configuration-notice";
import { InsightSynthesizer } from "@/components/insights/insight-synthesizer";
import { getConfigurationProblem } from "@/lib/llm/config";

// Rendered per request: the credential check must not be baked into a static page.
export const dynamic = "force-dynamic";

export default function HomePage() {
  const problem = getConfigurationProblem();
  if (problem) {
    return <ConfigurationNotice message={problem} />;
  }

  return (
    <div className="space-y-6">
      <div>
        <h1 className="text-2xl font-bold tracking-tight">AI Customer Insight Synthesizer (MVP)</h1>
        <p className="mt-1 text-muted-foreground">
          Upload customer feedback (CSV). Get themes, severity, frequency, and recommended actions
          with citations.
        </p>
      </div>
      <InsightSynthesizer />
    </div>
  );
}
