import type { Metadata } from "next";

import "./globals.css";

export const metadata: Metadata = {
  title: "Truth Sentinel | Misinformation Scanner",
  description: "Scan text, links and images for misinformation red flags."
};

export default function RootLayout({
  children
}: {
  children: React.ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
