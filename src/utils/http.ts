import axios from "axios";

/** Short, log-friendly description of a failed HTTP call. */
export function describeHttpFailure(error: unknown): string {
    if (axios.isAxiosError(error)) {
        if (error.response) {
            return `HTTP ${error.response.status}`;
        }
        return error.code ? `${error.code}: ${error.message}` : error.message;
    }
    return error instanceof Error ? error.message : String(error);
}
