import type { ReactNode } from "react";

export const metadata = {
  title: "Secondhand Market API",
  description: "Back end for the second-hand marketplace"
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="nl">
      <body>{children}</body>
    </html>
  );
}
