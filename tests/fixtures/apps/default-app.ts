import type { Request } from '../../../src/http/request.js';
import { text } from '../../../src/http/responses.js';

export default function app(request: Request) {
  return text({ status: 200, body: `default ${request.url.pathname}` });
}
