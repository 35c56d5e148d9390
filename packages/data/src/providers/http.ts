import type { FetchLike } from "../types";

export const DEFAULT_USER_AGENT = "Mozilla/5.0";

export const defaultFetch: FetchLike = (url, init) => fetch(url, init);

export const isRecord = (value: unknown): value is Record<string, unknown> =>
	typeof value === "object" && value !== null && !Array.isArray(value);

/** GET `url` and return the body; non-2xx responses throw. */
export const requestText = async (
	fetchImpl: FetchLike,
	provider: string,
	url: string,
	headers: Record<string, string> = {}
): Promise<string> => {
	const res = await fetchImpl(url, {
		headers: { "User-Agent": DEFAULT_USER_AGENT, ...headers },
	});
	const text = await res.text();
	if (!res.ok) {
		throw new Error(
			`${provider} request failed ${res.status}: ${text.slice(0, 200)}`
		);
	}
	return text;
};

export const parseJson = (provider: string, text: string): unknown => {
	try {
		return JSON.parse(text);
	} catch (error) {
		throw new Error(`${provider} returned malformed JSON`, { cause: error });
	}
};
