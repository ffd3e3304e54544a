import Link from "next/link";
import { Button } from "@/components/ui/button";

export default function NotFound() {
  return (
    <div className="flex min-h-[60vh] items-center justify-center px-6">
      <div className="text-center">
        <h1 className="text-6xl font-bold text-muted-foreground/30">404</h1>
        <h2 className="mt-4 text-xl font-semibold">Page not found</h2>
        <p className="mt-2 text-muted-foreground">
          The synthesizer lives on the home page.
        </p>
        <Button asChild className="mt-6">
          <Link href="/">Back to the synthesizer</Link>
        </Button>
      </div>
    </div>
  );
}
