import { ColloquyError } from "@colloquy/core";

/**
 * POST a JSON body and return the response once it is known to be 2xx.
 * Transport failures and error statuses become COLLABORATOR_ERROR.
 */
export async function postJson(
  service: string,
  url: string,
  body: unknown,
  headers: Record<string, string>
): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
    });
  } catch (err) {
    throw new ColloquyError("COLLABORATOR_ERROR", `${service} request failed`, { cause: err });
  }
  if (!response.ok) {
    throw new ColloquyError(
      "COLLABORATOR_ERROR",
      `${service} API error ${response.status}: ${await response.text()}`
    );
  }
  return response;
}

export async function readBytes(response: Response): Promise<Uint8Array> {
  return new Uint8Array(await response.arrayBuffer());
}
