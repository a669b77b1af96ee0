/**
 * Hello World Example
 *
 * Stateless routes: query arguments, wildcard parameters, static markup
 * and a custom not-found page.
 */

import { pathToFileURL } from 'node:url';
import { loadConfig } from '../framework/config/config.ts';
import type { ServerRequest } from '../framework/http/request.ts';
import { respond, type WebResponse } from '../framework/http/response.ts';
import { WebService, type WebServiceOptions } from '../framework/http/server.ts';

const HELLO_PAGE = '<!DOCTYPE html><html><body><h1>Hello!</h1></body></html>';

const LOGO = `<svg xmlns="http://www.w3.org/2000/svg" width="32" height="32">
  <circle cx="16" cy="16" r="14" fill="teal"/>
</svg>`;

export function root(req: ServerRequest<null>): WebResponse {
  return respond.html(`<h1>Hello, World! ${JSON.stringify(req.args)}</h1>`);
}

export function give(req: ServerRequest<null>): WebResponse {
  return respond.json({ test: req.params.id });
}

export function createHelloService(addr: string, options?: WebServiceOptions): WebService<null> {
  return new WebService<null>(addr, null, options)
    .register('/', 'GET', root)
    .register('/test/{id}/give', 'GET', give)
    .register('/hello', 'GET', () => respond.html(HELLO_PAGE))
    .register('/logo.svg', 'GET', () => respond.svg(LOGO))
    .register('404', 'GET', () => respond.html('404 :('));
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const config = await loadConfig();
  await createHelloService(config.address()).listen(config.boolean('openBrowser', true));
}
