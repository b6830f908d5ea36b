import http from 'http';
import pino from 'pino';
import type { SqliteJournal } from './db';

const logger = pino({ level: process.env.LOG_LEVEL ?? 'info' });

export interface StatusResponse {
  status: number;
  contentType: string;
  body: string;
}

const json = (status: number, payload: unknown): StatusResponse => ({
  status,
  contentType: 'application/json',
  body: JSON.stringify(payload),
});

const PAGE =
  '<!doctype html>' +
  '<html><head>' +
  '<meta charset="utf-8" />' +
  '<meta name="viewport" content="width=device-width, initial-scale=1" />' +
  '<title>Spot Sentinel</title>' +
  '<style>' +
  'body{font-family:system-ui,-apple-system,Segoe UI,Roboto,sans-serif;margin:24px;color:#111}' +
  'table{width:100%;border-collapse:collapse}th,td{padding:6px 8px;border-bottom:1px solid #eee;text-align:left;font-size:14px}' +
  '.muted{color:#666}' +
  '</style>' +
  '<script>' +
  'async function refresh(){' +
  'const r=await fetch("/orders?limit=50");const rows=(await r.json()).rows||[];' +
  'document.getElementById("orders").innerHTML="<table><thead><tr><th>TS</th><th>Mode</th><th>Symbol</th><th>Side</th><th>Qty</th><th>Status</th><th>Detail</th></tr></thead><tbody>"+' +
  'rows.map(function(o){return "<tr><td class=\\"muted\\">"+new Date(o.ts).toISOString()+"</td><td>"+o.mode+"</td><td>"+o.symbol+"</td><td>"+o.side+"</td><td>"+(o.quantity==null?"-":o.quantity)+"</td><td>"+o.status+"</td><td class=\\"muted\\">"+(o.detail||"")+"</td></tr>";}).join("")+"</tbody></table>";' +
  '}' +
  'setInterval(refresh,5000);window.onload=refresh;' +
  '</script>' +
  '</head><body><h1>Spot Sentinel</h1><div id="orders">Loading…</div></body></html>';

function readLimit(raw: string | null, fallback: number): number {
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? Math.min(n, 500) : fallback;
}

export function routeStatusRequest(journal: SqliteJournal, rawUrl: string): StatusResponse {
  const url = new URL(rawUrl, 'http://localhost');
  switch (url.pathname) {
    case '/health':
      return json(200, { ok: true });
    case '/cycles':
      return json(200, { rows: journal.recent(readLimit(url.searchParams.get('limit'), 20)).reverse() });
    case '/orders':
      return json(200, { rows: journal.recentOrderResults(readLimit(url.searchParams.get('limit'), 50)) });
    case '/':
      return { status: 200, contentType: 'text/html; charset=utf-8', body: PAGE };
    default:
      return json(404, { error: 'not found' });
  }
}

export function createStatusServer(journal: SqliteJournal): http.Server {
  return http.createServer((req, res) => {
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }
    try {
      const out = routeStatusRequest(journal, req.url ?? '/');
      res.writeHead(out.status, { 'Content-Type': out.contentType });
      res.end(out.body);
    } catch (err) {
      logger.error({ err, url: req.url }, 'status request failed');
      res.writeHead(500, { 'Content-Type': 'application/json' });
      res.end(JSON.stringify({ error: 'internal error' }));
    }
  });
}
