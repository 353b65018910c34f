import express, { Request, Response } from 'express';
import { JobRepo } from '../db/repo.js';
import { NotInDLQError } from '../core/errors.js';
import { Supervisor } from '../core/supervisor.js';
import { JOB_STATES } from '../core/types.js';
import { Logger } from '../utils/logger.js';

export function escapeHtml(s: string) {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function clip(s: string, max = 60) {
  return s.length > max ? s.slice(0, max) + '...' : s;
}

const STYLE = `
  :root { --bg: #0d0d10; --card: #1b1b1f; --text: #e8e8e8; --line: #2a2a2d;
          --accent: #007bff; --ok: #4caf50; --bad: #f44336; --warn: #ff9800; --muted: #6c757d; }
  * { box-sizing: border-box; }
  body { margin: 0; font-family: system-ui, sans-serif; background: var(--bg); color: var(--text); }
  header { display: flex; justify-content: space-between; align-items: center;
           padding: 12px 24px; background: #18181b; border-bottom: 1px solid var(--line); }
  header h1 { margin: 0; font-size: 1.4rem; color: var(--accent); }
  nav a { margin-left: 18px; color: var(--text); text-decoration: none; }
  main { padding: 16px 28px; }
  h2 { margin-top: 32px; padding-left: 8px; border-left: 4px solid var(--accent); color: var(--accent); }
  table { width: 100%; border-collapse: collapse; background: var(--card); margin-top: 8px; }
  th, td { padding: 8px 10px; border-bottom: 1px solid var(--line); font-size: 0.9rem; text-align: left; }
  th { background: #202024; color: #ccc; }
  button { padding: 5px 10px; border: 0; border-radius: 4px; background: var(--accent); color: #fff; cursor: pointer; }
  .badge { display: inline-block; padding: 2px 7px; border-radius: 4px; font-size: 0.75rem; font-weight: 600; }
  .badge.pending { background: var(--warn); color: #000; }
  .badge.processing { background: var(--accent); }
  .badge.completed { background: var(--ok); color: #000; }
  .badge.dead { background: var(--muted); }
  .badge.error { background: var(--bad); }
  .stats-bar { display: flex; justify-content: space-around; margin-top: 16px; padding: 14px;
               background: var(--card); border: 1px solid var(--line); border-radius: 8px; }
  .stat { text-align: center; }
  .stat span { display: block; margin-top: 4px; font-size: 1.4rem; }
  .stat.pending span { color: var(--warn); }
  .stat.processing span { color: var(--accent); }
  .stat.completed span { color: var(--ok); }
  .stat.dead span { color: var(--muted); }
  #toast { position: fixed; top: 14px; right: 14px; padding: 10px 16px; border-radius: 6px; display: none; }
  #toast.success { display: block; background: var(--ok); }
  #toast.error { display: block; background: var(--bad); }
`;

const SCRIPT = `
  function toast(msg, kind) {
    const t = document.getElementById('toast');
    t.textContent = msg;
    t.className = kind;
    setTimeout(() => { t.className = ''; }, 2500);
  }
  async function retryJob(id) {
    const res = await fetch('/dlq/retry/' + encodeURIComponent(id), { method: 'POST' });
    if (!res.ok) return toast('Retry failed: ' + await res.text(), 'error');
    toast('Job ' + id + ' requeued', 'success');
    setTimeout(() => location.reload(), 1000);
  }
`;

export function html(title: string, body: string) {
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1.0" />
  <title>${escapeHtml(title)}</title>
  <style>${STYLE}</style>
</head>
<body>
  <header>
    <h1>shellq</h1>
    <nav><a href="/jobs">Jobs</a><a href="/dlq">DLQ</a></nav>
  </header>
  <main>${body}</main>
  <div id="toast"></div>
  <script>${SCRIPT}</script>
</body>
</html>`;
}

export function createApp(jobs: JobRepo, supervisor: Supervisor) {
  const app = express();

  app.get('/', (_req: Request, res: Response) => res.redirect('/jobs'));

  app.get('/jobs', (_req: Request, res: Response) => {
    const { counts } = jobs.summary();

    let body = `
    <div class="stats-bar">
      ${JOB_STATES.map(
        (s) => `
        <div class="stat ${s}">
          ${s.toUpperCase()}
          <span>${counts[s]}</span>
        </div>`
      ).join('')}
      <div class="stat workers">
        WORKERS
        <span>${supervisor.activeWorkers().length}</span>
      </div>
    </div>`;

    for (const s of JOB_STATES) {
      const rows = jobs.findByState(s);

      body += `<h2>${s.toUpperCase()} <span class="badge ${s}">${rows.length}</span></h2>`;
      if (rows.length === 0) {
        body += `<p><i>No jobs</i></p>`;
        continue;
      }

      body += `<table><tr><th>ID</th><th>Command</th><th>Attempts</th><th>Next Run</th><th>Last Error</th></tr>`;
      for (const r of rows) {
        body += `<tr>
          <td>${escapeHtml(r.id)}</td>
          <td>${escapeHtml(r.command)}</td>
          <td>${r.attempts}/${r.retry_limit}</td>
          <td>${r.next_run_at ?? ''}</td>
          <td>${r.last_error ? `<span class='badge error'>${escapeHtml(clip(r.last_error))}</span>` : ''}</td>
        </tr>`;
      }
      body += `</table>`;
    }

    res.send(html('Queue Dashboard', body));
  });

  app.get('/dlq', (_req: Request, res: Response) => {
    const rows = jobs.listDLQ();

    let body = `<div class="stats-bar">
      <div class="stat dead">DLQ JOBS<span>${rows.length}</span></div>
    </div>`;

    if (rows.length === 0) {
      body += `<p><i>No failed jobs in DLQ</i></p>`;
    } else {
      body += `<table><tr><th>ID</th><th>Command</th><th>Attempts</th><th>Failed At</th><th>Error</th><th>Action</th></tr>`;
      for (const r of rows) {
        body += `<tr>
          <td>${escapeHtml(r.id)}</td>
          <td>${escapeHtml(r.command)}</td>
          <td>${r.attempts}</td>
          <td>${r.updated_at}</td>
          <td><span class='badge error'>${escapeHtml(clip(r.last_error ?? ''))}</span></td>
          <td><button onclick="retryJob(${escapeHtml(JSON.stringify(r.id))})">Retry</button></td>
        </tr>`;
      }
      body += `</table>`;
    }

    res.send(html('Dead Letter Queue', body));
  });

  app.post('/dlq/retry/:id', (req: Request, res: Response) => {
    try {
      jobs.resurrect(req.params.id);
      res.status(200).send('OK');
    } catch (err) {
      if (err instanceof NotInDLQError) {
        res.status(404).send(err.message);
        return;
      }
      throw err;
    }
  });

  app.get('/api/summary', (_req: Request, res: Response) => {
    const { counts, oldestPending } = jobs.summary();
    res.json({ ...counts, active_workers: supervisor.activeWorkers().length, oldest_pending: oldestPending });
  });

  return app;
}

export function startDashboard(jobs: JobRepo, supervisor: Supervisor, port: number, logger: Logger) {
  return createApp(jobs, supervisor).listen(port, () => {
    logger.info('dashboard listening', { url: `http://localhost:${port}` });
  });
}
