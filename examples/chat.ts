/**
 * Chat Example
 *
 * A single-room chat whose history lives in the shared state.
 *
 *   POST /chat     {"username": "...", "message": "..."} -> full history
 *   GET  /history  full history
 *   GET  /         the chat page
 */

import { readFile } from 'node:fs/promises';
import { pathToFileURL } from 'node:url';
import { WebService, type WebServiceOptions } from '../framework/http/server.ts';
import type { ServerRequest } from '../framework/http/request.ts';
import { respond, type WebResponse } from '../framework/http/response.ts';
import { WebError } from '../framework/http/types.ts';
import { loadConfig } from '../framework/config/config.ts';

export interface Message {
  username: string;
  message: string;
}

function isMessage(value: unknown): value is Message {
  return (
    typeof value === 'object' &&
    value !== null &&
    'username' in value &&
    'message' in value &&
    typeof value.username === 'string' &&
    typeof value.message === 'string'
  );
}

export async function history(req: ServerRequest<Message[]>): Promise<WebResponse> {
  const messages = await req.state.lock((guard) => [...guard.value]);
  return respond.json({ messages });
}

export async function chat(req: ServerRequest<Message[]>): Promise<WebResponse> {
  const data = req.json();
  if (!isMessage(data)) {
    return respond.error(WebError.BAD_REQUEST);
  }

  const messages = await req.state.lock((guard) => {
    guard.value.push({ username: data.username, message: data.message });
    return [...guard.value];
  });

  return respond.json({ messages });
}

export async function page(): Promise<WebResponse> {
  return respond.html(await readFile(new URL('./chat.html', import.meta.url), 'utf8'));
}

export function createChatService(addr: string, options?: WebServiceOptions): WebService<Message[]> {
  return new WebService<Message[]>(addr, [], options)
    .register('/', 'GET', page)
    .register('/chat', 'POST', chat)
    .register('/history', 'GET', history);
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const config = await loadConfig();
  await createChatService(config.address()).listen(config.boolean('openBrowser', false));
}
