import type { ReactNode } from "react";
import type { Metadata } from "next";
import "./globals.css";
import { Toaster } from "@/components/ui/sonner";

export const metadata: Metadata = {
  title: "AI Insight Synthesizer",
  description:
    "Upload customer feedback and get themes, severity, frequency, and recommended actions with citations",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">
        <main id="main-content" className="mx-auto w-full max-w-6xl px-6 py-8">
          {children}
        </main>
        <Toaster />
      </body>
    </html>
  );
}
