/**
 * HTML pages returned to the browser at the end of the consent flow
 */

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#039;');
}

/**
 * Wrap a heading and an already-escaped body paragraph in a minimal document
 */
function renderPage(heading: string, bodyHtml: string): string {
  return `<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <title>${escapeHtml(heading)}</title>
  </head>
  <body>
    <h1>${escapeHtml(heading)}</h1>
    <p>${bodyHtml}</p>
  </body>
</html>
`;
}

export function cancelledPage(): string {
  return renderPage('Authorization cancelled', 'You can close this tab and try again from Discord.');
}

export function failurePage(message: string): string {
  return renderPage('Something went wrong', escapeHtml(message));
}

export function connectedPage(): string {
  return renderPage(
    'Connected!',
    'Your Google account is linked. You can close this tab and return to Discord.'
  );
}
