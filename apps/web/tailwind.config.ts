import type { Config } from "tailwindcss";

const config: Config = {
    content: [
        "./app/**/*.{js,ts,jsx,tsx,mdx}",
        "./components/**/*.{js,ts,jsx,tsx,mdx}",
    ],
    theme: {
        extend: {
            colors: {
                terminal: {
                    bg: "#0c0c0c",
                    bgLight: "#141414",      // cards
                    text: "#5f9ea0",
                    textBright: "#7ec8ca",
                    accent: "#5f9ea0",
                    red: "#c94c4c",
                    dim: "#4a4a4a",          // secondary text
                    border: "#2a2a2a",
                }
            },
            fontFamily: {
                mono: [
                    "IBM Plex Mono",
                    "ui-monospace",
                    "Menlo",
                    "Consolas",
                    "monospace"
                ],
            },
        },
    },
    plugins: [],
};
export default config;
