import type { RequestBody } from './request.js';
import type { ResponseBody } from './response.js';

export function writeText(text: string): ResponseBody {
  return async (stream) => {
    const writer = stream.getWriter();
    const encoder = new TextEncoder();
    await writer.write(encoder.encode(text));
    writer.releaseLock();
  };
}

export function writeJson(json: unknown): ResponseBody {
  if (json === undefined) return async () => {};
  return writeText(JSON.stringify(json));
}

export async function readBytes(body: RequestBody): Promise<Uint8Array> {
  const chunks: Uint8Array[] = [];
  let length = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    length += chunk.byteLength;
  }
  const result = new Uint8Array(length);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.byteLength;
  }
  return result;
}

export async function readText(
  body: RequestBody,
  encoding: BufferEncoding = 'utf-8'
): Promise<string> {
  const bytes = await readBytes(body);
  const decoder = new TextDecoder(encoding);
  return decoder.decode(bytes);
}

export async function readJson(
  body: RequestBody,
  encoding: BufferEncoding = 'utf-8'
): Promise<unknown> {
  const text = await readText(body, encoding);
  return JSON.parse(text);
}
