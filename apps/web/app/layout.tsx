import type { Metadata } from "next";
import "./globals.css";
import ScanSessionProvider from "@/components/ScanSessionProvider";

export const metadata: Metadata = {
    title: "DevGuard — Scan your no-code export",
    description: "Upload an export or paste an OpenAPI spec. Get a Security Score with actionable fixes.",
};

export default function RootLayout({
    children,
}: Readonly<{
    children: React.ReactNode;
}>) {
    return (
        <html lang="en" className="dark">
            <body>
                <ScanSessionProvider>
                    {children}
                </ScanSessionProvider>
            </body>
        </html>
    );
}
