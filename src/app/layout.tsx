import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "Clause Extractor",
  description: "Recover the numbered clause hierarchy of standards documents.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>) {
  return (
    <html lang="en">
      <body className="antialiased">{children}</body>
    </html>
  );
}
