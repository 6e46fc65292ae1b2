export const escapeHtml = (value: string): string =>
  value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');

const renderShell = (title: string, body: string): string => `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${escapeHtml(title)}</title>
</head>
<body style="margin:0;padding:16px;font-family:sans-serif;text-align:center;">
${body}
</body>
</html>
`;

export const DASHBOARD_TITLE = 'Climbing Conditions Forecast';

export const renderDashboardPage = (imageDataUrl: string, generatedAt: string): string =>
  renderShell(
    DASHBOARD_TITLE,
    [
      `  <h1>${escapeHtml(DASHBOARD_TITLE)}</h1>`,
      `  <img src="${escapeHtml(imageDataUrl)}" alt="Temperature, humidity and climbing favorability forecast by location" style="max-width:100%;">`,
      `  <p><small>Generated ${escapeHtml(generatedAt)}</small></p>`,
    ].join('\n'),
  );

export const renderMessagePage = (message: string): string => renderShell(DASHBOARD_TITLE, `  <h1>${escapeHtml(message)}</h1>`);

export const pngDataUrl = (png: Buffer): string => `data:image/png;base64,${png.toString('base64')}`;
