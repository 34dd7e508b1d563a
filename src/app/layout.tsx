import type { Metadata } from "next";
import "./globals.css";

export const metadata: Metadata = {
  title: "BST Motion Lab",
  description: "Step-by-step animated binary search tree insert, search, delete and traversals",
};

export default function RootLayout({ children }: { children: React.ReactNode }) {
  return (
    <html lang="en" className="dark">
      <body className="antialiased">{children}</body>
    </html>
  );
}
