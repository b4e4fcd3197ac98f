import { clsx, type ClassValue } from "clsx";
import { twMerge } from "tailwind-merge";

export function cn(...inputs: ClassValue[]) {
    return twMerge(clsx(inputs));
}

/** Strip surrounding whitespace and any trailing slashes from a base URL. */
export function normalizeBaseUrl(value: string): string {
    return value.trim().replace(/\/+$/, "");
}
