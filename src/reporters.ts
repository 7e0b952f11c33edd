// src/reporters.ts
import fs from 'node:fs/promises';
import path from 'node:path';
import type { FileResult, PrettyReportOptions, RuleResult, Summary } from './types';

const niceDate = () =>
  new Date().toLocaleString(undefined, {
    year: 'numeric',
    month: 'short',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
  });

const codeFenceSafe = (src: string) => {
  // prevent breaking fenced blocks if content contains ```
  return src.replace(/```/g, '``\\`');
};

const fenceLang = (file: string) => {
  const ext = path.extname(file).slice(1).toLowerCase();
  return ext === 'markdown' ? 'md' : ext || 'text';
};

/* ----------------------------- Markdown report ----------------------------- */

export function slugify(id: string) {
  return id
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/(^-|-$)/g, '');
}

function fileAnchor(file: string) {
  return `file-${slugify(path.relative(process.cwd(), file) || path.basename(file))}`;
}

function displayName(file: string) {
  return path.relative(process.cwd(), file) || path.basename(file);
}

function counts(f: FileResult) {
  const passCount = f.rules.filter((r) => r.pass).length;
  return { passCount, failCount: f.rules.length - passCount };
}

const statusWord = (r: RuleResult) => (r.pass ? 'PASS' : r.severity === 'warn' ? 'WARN' : 'FAIL');

export function renderMarkdownReport(
  summary: Summary,
  opts: PrettyReportOptions = {}
): string {
  const { model, checked, passed, failed, errors, warnings, files } = summary;
  const showPassDetails = !!opts.showPassDetails;
  const includeSource = !!opts.includeSource;
  const expandSource = !!opts.expandSource;
  const safe = (s: string) => s.replace(/\r?\n/g, ' ').replace(/\|/g, '\\|');

  // ---------- DASHBOARD (top summary table with links) ----------
  const dashboardHeader = [
    `<a id="top"></a>`,
    ``,
    `# React Style Lint Report`,
    ``,
    `**Generated:** ${niceDate()}`,
    ``,
    `| Model | Files | Passed | Failed | Errors | Warnings |`,
    `| --- | ---: | ---: | ---: | ---: | ---: |`,
    `| ${model ? `\`${model}\`` : '—'} | ${checked} | ${passed} | ${failed} | ${errors} | ${warnings} |`,
    ``,
    `<a id="summary"></a>`,
    ``,
    `## Summary`,
    ``,
    `Click a **File** to jump to its details.`,
    ``,
    `| File | Status | Passed | Failed | Failed Rules |`,
    `|:-----|:------:|------:|------:|:-------------|`,
  ].join('\n');

  const dashboardRows = files
    .map((f) => {
      const { passCount, failCount } = counts(f);
      const failedRuleList =
        f.rules
          .filter((r) => !r.pass)
          .map((r) => `\`${r.id}\``)
          .join(', ') || '—';
      return `| [\`${displayName(f.file)}\`](#${fileAnchor(f.file)}) | ${
        f.overall_pass ? '✅' : '❌'
      } | ${passCount} | ${failCount} | ${failedRuleList} |`;
    })
    .join('\n');

  // ---------- DETAILED SECTIONS ----------
  const details = files
    .map((f) => {
      const { passCount, failCount } = counts(f);

      const failedBlocks = f.rules
        .filter((r) => !r.pass)
        .flatMap((r) => {
          const lines = [`- **${r.id}** (${statusWord(r)})`];
          if (r.violations.length) {
            for (const v of r.violations) {
              lines.push(`  - \`${v.line}:${v.column}\` ${safe(v.message)}`);
            }
          } else if (r.rationale) {
            lines.push(`  - **rationale:** ${safe(r.rationale)}`);
          }
          if (r.suggested_fixes.length) {
            lines.push(`  - **suggested fixes:**`);
            for (const fx of r.suggested_fixes.slice(0, 5)) {
              lines.push(`    - ${safe(fx)}`);
            }
            if (r.suggested_fixes.length > 5) {
              lines.push(`    - _+${r.suggested_fixes.length - 5} more_`);
            }
          }
          lines.push('');
          return lines;
        })
        .join('\n');

      const passedBlocks = f.rules
        .filter((r) => r.pass)
        .flatMap((r) => {
          const lines = [`- ✅ **${r.id}**`];
          if (showPassDetails) {
            if (r.rationale) lines.push(`  - **note:** ${safe(r.rationale)}`);
            for (const fx of r.suggested_fixes.slice(0, 3)) {
              lines.push(`  - ${safe(fx)}`);
            }
          }
          return lines;
        })
        .join('\n');

      const sourceBlock =
        includeSource && f.source
          ? [
              ``,
              `<details${expandSource ? ' open' : ''}>`,
              `<summary><strong>View source</strong></summary>`,
              ``,
              '```' + fenceLang(f.file),
              codeFenceSafe(f.source),
              '```',
              ``,
              `</details>`,
            ].join('\n')
          : '';

      return [
        `\n---\n`,
        `<a id="${fileAnchor(f.file)}"></a>`,
        ``,
        `### ${f.overall_pass ? '✅' : '❌'} \`${displayName(
          f.file
        )}\` (${passCount} passed, ${failCount} failed)`,
        sourceBlock,
        ``,
        failCount
          ? `**Failed rules**\n\n${failedBlocks}`
          : `_No failed rules for this file._`,
        ``,
        `**Passed rules**`,
        ``,
        passedBlocks || '_No passed rules._',
        ``,
        `[Back to summary](#summary) • [Back to top](#top)`,
      ].join('\n');
    })
    .join('\n');

  const footer = [
    `\n---`,
    `${failed ? '❌ **Result: FAIL**' : '✅ **Result: PASS**'}`,
    '',
  ].join('\n');

  return [dashboardHeader, dashboardRows, details, footer].join('\n');
}

/* ------------------------------- HTML report ------------------------------- */

export const escapeHtml = (s: string | number) =>
  String(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');

export function renderHtmlReport(
  summary: Summary,
  opts: PrettyReportOptions = {}
): string {
  const { failed, files } = summary;
  const showPassDetails = !!opts.showPassDetails;
  const includeSource = !!opts.includeSource;
  const expandSource = !!opts.expandSource;
  const esc = escapeHtml;

  const summaryRow = files
    .map((f) => {
      const { passCount, failCount } = counts(f);
      const id = fileAnchor(f.file);
      const failedRules =
        f.rules
          .filter((r) => !r.pass)
          .map((r) => esc(r.id))
          .join(', ') || '—';
      const icon = f.overall_pass ? '🟢' : '🔴';
      return `
        <tr>
          <td class="status" aria-label="${f.overall_pass ? 'Pass' : 'Fail'}">${icon}</td>
          <th scope="row"><a href="#${id}" class="file-link">${esc(displayName(f.file))}</a></th>
          <td class="num">${passCount}</td>
          <td class="num">${failCount}</td>
          <td class="failed-list">${failedRules}</td>
        </tr>`;
    })
    .join('\n');

  const fixList = (r: RuleResult, max: number) =>
    r.suggested_fixes.length
      ? `<div class="kv"><span>suggested fixes:</span><ul>${
          r.suggested_fixes
            .slice(0, max)
            .map((fx) => `<li>${esc(fx)}</li>`)
            .join('') +
          (r.suggested_fixes.length > max
            ? `<li class="more">+${r.suggested_fixes.length - max} more</li>`
            : '')
        }</ul></div>`
      : '';

  const fileSections = files
    .map((f) => {
      const { passCount, failCount } = counts(f);
      const id = fileAnchor(f.file);

      const failedBlocks = f.rules
        .filter((r) => !r.pass)
        .map((r) => {
          const warn = r.severity === 'warn';
          const body = r.violations.length
            ? `<ul class="violations">${r.violations
                .map(
                  (v) =>
                    `<li><code class="pos">${v.line}:${v.column}</code> ${esc(v.message)}</li>`
                )
                .join('')}</ul>`
            : r.rationale
              ? `<div class="kv"><span>rationale:</span><p>${esc(r.rationale)}</p></div>`
              : '';
          return `
          <div class="rule ${warn ? 'warn' : 'fail'}" role="group" aria-labelledby="${id}-fail-${esc(r.id)}">
            <div class="rule-head">
              <span class="badge ${warn ? 'warn' : 'bad'}">${statusWord(r)}</span>
              <strong id="${id}-fail-${esc(r.id)}">${esc(r.id)}</strong>
            </div>
            ${body}
            ${fixList(r, 5)}
          </div>`;
        })
        .join('');

      const passedBlocks = f.rules
        .filter((r) => r.pass)
        .map((r) => {
          const notes =
            showPassDetails && r.rationale
              ? `<div class="kv"><span>note:</span><p>${esc(r.rationale)}</p></div>`
              : '';
          return `
            <div class="rule pass${notes ? '' : ' compact'}" role="group" aria-label="PASS ${esc(r.id)}">
              <div class="rule-head">
                <span class="badge ok">PASS</span>
                <strong>${esc(r.id)}</strong>
              </div>
              ${notes}${showPassDetails ? fixList(r, 3) : ''}
            </div>`;
        })
        .join('');

      const sourceBlock =
        includeSource && f.source
          ? `
        <details class="source"${expandSource ? ' open' : ''}>
          <summary>View source</summary>
          <pre><code id="${id}-src" class="lang-${fenceLang(f.file)}">${esc(f.source)}</code></pre>
        </details>`
          : '';

      return `
        <section class="file ${f.overall_pass ? 'ok' : 'bad'}" id="${id}" aria-labelledby="${id}-title">
          <h2 id="${id}-title">${f.overall_pass ? '✅' : '❌'} ${esc(displayName(f.file))}
            <small>(${passCount} passed, ${failCount} failed)</small>
          </h2>

          ${sourceBlock}

          <div class="rules-group">
            <h3>Failed rules</h3>
            ${failedBlocks || `<p class="muted">No failed rules for this file.</p>`}
          </div>

          <div class="rules-group">
            <h3>Passed rules</h3>
            ${passedBlocks || `<p class="muted">No passed rules.</p>`}
          </div>

          <p class="backlinks">
            <a href="#summary" class="back">Back to summary</a> ·
            <a href="#top" class="back">Back to top</a>
          </p>
        </section>`;
    })
    .join('\n');

  const resultBadge = failed
    ? `<span class="badge bad" aria-label="Overall result: FAIL" role="status">FAIL</span>`
    : `<span class="badge ok" aria-label="Overall result: PASS" role="status">PASS</span>`;

  return `<!doctype html>
<html>
<head>
<meta charset="utf-8"/>
<title>React Style Lint Report</title>
<style>
  :root{
    --bg:#0f1115; --panel:#171923; --ink:#e6e6e6; --muted:#9aa2b1;
    --ok:#22c55e; --bad:#ef4444; --warn:#eab308; --hl:#60a5fa; --chip:#232739; --table:#0f1525;
  }
  *{box-sizing:border-box}
  html,body{margin:0;padding:0;background:var(--bg);color:var(--ink);font:14px/1.5 ui-sans-serif,system-ui,Segoe UI,Roboto,Helvetica,Arial}
  a{color:var(--hl)}
  .wrap{max-width:1180px;margin:32px auto;padding:0 20px}
  header{margin-bottom:18px}
  h1{font-size:24px;margin:0 0 6px}
  .meta{color:var(--muted)}
  .chips{display:flex;gap:8px;flex-wrap:wrap;margin:12px 0 0}
  .chip{background:var(--chip);padding:4px 10px;border-radius:999px;color:var(--ink)}
  .badge{display:inline-block;padding:2px 8px;border-radius:6px;font-weight:700;font-size:12px;vertical-align:middle}
  .badge.ok{background:rgba(34,197,94,.15);color:var(--ok);border:1px solid rgba(34,197,94,.35)}
  .badge.bad{background:rgba(239,68,68,.15);color:var(--bad);border:1px solid rgba(239,68,68,.35)}
  .badge.warn{background:rgba(234,179,8,.15);color:var(--warn);border:1px solid rgba(234,179,8,.35)}

  table.summary{width:100%;border-collapse:collapse;background:var(--panel);border:1px solid rgba(255,255,255,.08);border-radius:12px;overflow:hidden}
  table.summary th, table.summary td{padding:10px 12px;border-bottom:1px solid rgba(255,255,255,.06)}
  table.summary thead th{background:var(--table);text-align:left;color:var(--muted);font-size:13px}
  table.summary td.num{text-align:right}
  table.summary td.status{text-align:center;width:64px}
  table.summary td.failed-list{color:var(--muted)}
  .file-link{font-weight:600}

  section.file{background:var(--panel);border-radius:14px;margin:18px 0;padding:16px;border:1px solid rgba(255,255,255,.06)}
  section.file h2{margin:0 0 8px;font-size:18px;display:flex;align-items:center;gap:8px}
  section.file h2 small{color:var(--muted);font-weight:400}

  .rules-group{margin:10px 0 0}
  .rules-group h3{margin:6px 0 8px;font-size:13px;color:var(--muted);text-transform:uppercase;letter-spacing:.06em}

  .rule{border:1px solid rgba(255,255,255,.08);border-radius:12px;padding:10px 12px;margin:8px 0;background:rgba(255,255,255,.02)}
  .rule.compact{display:flex;align-items:center;gap:8px}
  .rule-head{display:flex;align-items:center;gap:10px;margin-bottom:6px}
  .rule.fail{border-color: rgba(239,68,68,.35);background: rgba(239,68,68,.06)}
  .rule.warn{border-color: rgba(234,179,8,.35);background: rgba(234,179,8,.06)}
  .rule.pass{border-color: rgba(34,197,94,.35);background: rgba(34,197,94,.06)}
  ul.violations{margin:0;padding-left:18px}
  code.pos{color:var(--muted)}

  .kv{display:grid;grid-template-columns:120px 1fr;gap:10px;margin:6px 0}
  .kv>span{color:var(--muted)}
  .kv>ul{margin:0;padding-left:18px}
  .kv>ul .more{color:var(--muted);list-style: none;margin-left:-18px}

  details.source{margin-top:10px}
  details.source summary{cursor:pointer;color:var(--hl);outline:none}
  pre{background:#0b0d13;border:1px solid rgba(255,255,255,.08);border-radius:10px;padding:12px;overflow:auto}
  code{font-family:ui-monospace,SFMono-Regular,Menlo,Consolas,Monaco,monospace;font-size:12px;white-space:pre}
  .muted{color:var(--muted)}
  .backlinks{margin-top:8px}
  footer{margin:16px 0 40px;color:var(--muted)}
</style>
</head>
<body>
<div class="wrap">
  <a id="top"></a>
  <header>
    <h1>React Style Lint Report ${resultBadge}</h1>
    <div class="meta">Generated ${esc(niceDate())}</div>
    <div class="chips" role="group" aria-label="Report meta">
      ${summary.model ? `<span class="chip">Model: <strong>${esc(summary.model)}</strong></span>` : ''}
      <span class="chip">Files: <strong>${summary.checked}</strong></span>
      <span class="chip ok">Passed: <strong>${summary.passed}</strong></span>
      <span class="chip bad">Failed: <strong>${summary.failed}</strong></span>
      <span class="chip">Errors: <strong>${summary.errors}</strong></span>
      <span class="chip">Warnings: <strong>${summary.warnings}</strong></span>
    </div>
  </header>

  <h2 id="summary">Summary</h2>
  <p class="meta">Select a file name to jump to its details.</p>
  <table class="summary" role="table" aria-label="Summary of all files">
    <thead>
      <tr>
        <th scope="col" style="width:64px;text-align:center;">Status</th>
        <th scope="col">File</th>
        <th scope="col" style="text-align:right;">Passed</th>
        <th scope="col" style="text-align:right;">Failed</th>
        <th scope="col">Failed Rules</th>
      </tr>
    </thead>
    <tbody>
      ${summaryRow}
    </tbody>
  </table>

  ${fileSections}

  <footer>End of report • <a href="#top">Back to top</a></footer>
</div>
</body>
</html>`;
}

/* ------------------------------ Write to disk ------------------------------ */

/** Write the machine-readable summary. */
export async function writeJsonReport(summary: Summary, reportPath: string) {
  await fs.mkdir(path.dirname(reportPath), { recursive: true });
  await fs.writeFile(reportPath, JSON.stringify(summary, null, 2) + '\n', 'utf8');
  console.log(`🧾 Wrote JSON report to ${reportPath}`);
}

/** Returns the paths written, one per format. */
export async function writePrettyReport(
  summary: Summary,
  opts: PrettyReportOptions = {}
): Promise<string[]> {
  const format = opts.format ?? 'md';
  if (format === 'none') return [];
  const base = opts.outBasePath || path.resolve(process.cwd(), 'reports/lint');
  await fs.mkdir(path.dirname(base), { recursive: true });

  const formats = format === 'all' ? (['md', 'html'] as const) : ([format] as const);
  const written: string[] = [];

  for (const fmt of formats) {
    if (fmt === 'md') {
      const p = `${base}.md`;
      await fs.writeFile(p, renderMarkdownReport(summary, opts), 'utf8');
      console.log(`📝 Wrote Markdown report to ${p}`);
      written.push(p);
    } else {
      const p = `${base}.html`;
      await fs.writeFile(p, renderHtmlReport(summary, opts), 'utf8');
      console.log(`🖥️  Wrote HTML report to ${p}`);
      written.push(p);
    }
  }
  return written;
}
