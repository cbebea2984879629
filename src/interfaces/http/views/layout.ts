/**
 * Page Layout
 * Layer: Interfaces (HTTP)
 *
 * Wraps a page body with the document shell, navigation and any flash
 * messages consumed for this request.
 */
import type { FlashMessage } from '@interfaces/http/middleware/session';

import { html, type SafeHtml } from './html';

export interface PageOptions {
  title: string;
  body: SafeHtml;
  flashes?: FlashMessage[];
}

export function layout({ title, body, flashes = [] }: PageOptions): string {
  return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title} · Banks</title>
  </head>
  <body>
    <nav><a href="/banks">Banks</a> | <a href="/banks/new">Add bank</a></nav>
    ${flashes.map(
      (flash) => html`<p class="flash flash-${flash.category}">${flash.message}</p>`,
    )}
    <main>
      <h1>${title}</h1>
      ${body}
    </main>
  </body>
</html>
`.toString();
}
