import { ALL_REGIONS, displayName, type ReferenceData } from '../config/referenceData.js';
import type { TalentRecord } from '../talents/types.js';

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

/** One leaderboard card. Single line so it fits in one SSE data field. */
export function renderTalentRecord(record: TalentRecord): string {
  return [
    '<div class="talent-entry">',
    `<h3>#${record.rank} - ${escapeHtml(record.name)}</h3>`,
    `<div class="talent-string">${escapeHtml(record.talentCode)}</div>`,
    `<a href="${escapeHtml(record.logUrl)}" target="_blank" rel="noopener">View Log →</a>`,
    '</div>',
  ].join('');
}

export function renderStreamError(message: string): string {
  return `<div class="error">Error: ${escapeHtml(message)}</div>`;
}

function option(value: string | number, label: string): string {
  return `<option value="${escapeHtml(String(value))}">${escapeHtml(label)}</option>`;
}

export function renderHomePage(ref: ReferenceData): string {
  const classKeys = Object.keys(ref.classes).sort();
  const classOptions = classKeys.map(k => option(k, displayName(k))).join('\n          ');
  const encounterOptions = ref.encounters.map(e => option(e.id, e.name)).join('\n          ');
  const regionOptions = ref.regions.map(r => option(r.code, r.name)).join('\n          ');
  const specsByClass = Object.fromEntries(classKeys.map(k => [k, ref.classes[k]?.specs ?? []]));
  // JSON inside <script>: keep "</script>" from terminating the block.
  const specsJson = JSON.stringify(specsByClass).replace(/</g, '\\u003c');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>Talent Trends</title>
  <style>
    body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; max-width: 900px; margin: 40px auto; padding: 0 20px; background: #1a1a1a; color: #e0e0e0; }
    h1 { color: #fff; border-bottom: 3px solid #c69b6d; padding-bottom: 12px; }
    h2 { color: #c69b6d; margin-top: 32px; }
    .form-container { background: #2a2a2a; padding: 24px; border-radius: 8px; margin: 24px 0; }
    select, button { padding: 10px 16px; margin: 8px 8px 8px 0; font-size: 14px; border-radius: 4px; border: 1px solid #444; background: #333; color: #e0e0e0; min-width: 200px; }
    button { background: #c69b6d; color: #1a1a1a; font-weight: 600; cursor: pointer; border: none; min-width: auto; }
    button:disabled { background: #555; color: #888; cursor: not-allowed; }
    .talent-entry { border: 1px solid #444; padding: 16px; margin: 12px 0; border-radius: 6px; background: #2a2a2a; }
    .talent-entry h3 { margin-top: 0; color: #c69b6d; }
    .talent-string { font-family: 'Courier New', monospace; background: #1a1a1a; padding: 8px; border-radius: 4px; overflow-x: auto; font-size: 12px; margin: 12px 0; }
    .talent-entry a { color: #6db3c6; text-decoration: none; }
    .loading { text-align: center; padding: 40px; color: #888; }
    .error { color: #e06c75; background: #2a1a1a; padding: 16px; border-radius: 6px; border-left: 4px solid #e06c75; }
  </style>
</head>
<body>
  <h1>Talent Trends</h1>
  <div class="form-container">
    <form id="talent-form">
      <select name="encounter" id="encounter" required>
        <option value="">Select Boss</option>
          ${encounterOptions}
      </select>
      <select name="class" id="class" required>
        <option value="">Select Class</option>
          ${classOptions}
      </select>
      <select name="spec" id="spec" required disabled>
        <option value="">Select Spec</option>
      </select>
      <select name="region" id="region">
          ${regionOptions}
      </select>
      <button type="submit" id="submit-btn" disabled>Get Talents</button>
    </form>
  </div>
  <div id="results"></div>
  <script>
    const specsData = ${specsJson};
    const form = document.getElementById('talent-form');
    const encounterSelect = document.getElementById('encounter');
    const classSelect = document.getElementById('class');
    const specSelect = document.getElementById('spec');
    const regionSelect = document.getElementById('region');
    const submitBtn = document.getElementById('submit-btn');
    const resultsDiv = document.getElementById('results');
    regionSelect.value = '${ALL_REGIONS}';
    let source = null;

    function updateSubmitButton() {
      submitBtn.disabled = !(encounterSelect.value && classSelect.value && specSelect.value) || source !== null;
    }

    classSelect.addEventListener('change', () => {
      specSelect.innerHTML = '<option value="">Select Spec</option>';
      const specs = specsData[classSelect.value] || [];
      for (const spec of specs) {
        const opt = document.createElement('option');
        opt.value = spec;
        opt.textContent = spec.replace(/_/g, ' ');
        specSelect.appendChild(opt);
      }
      specSelect.disabled = specs.length === 0;
      updateSubmitButton();
    });
    encounterSelect.addEventListener('change', updateSubmitButton);
    specSelect.addEventListener('change', updateSubmitButton);

    form.addEventListener('submit', e => {
      e.preventDefault();
      if (source) source.close();
      const params = new URLSearchParams(new FormData(form));
      resultsDiv.innerHTML = '<h2>Top 10 Talents</h2><div class="loading" id="loading">Loading top talents...</div>';
      let received = 0;
      source = new EventSource('/api/talents?' + params.toString());
      updateSubmitButton();

      const finish = () => {
        if (source) source.close();
        source = null;
        const loading = document.getElementById('loading');
        if (loading) loading.textContent = received ? '' : 'No talent data found.';
        updateSubmitButton();
      };
      source.addEventListener('talent', ev => {
        received += 1;
        document.getElementById('loading').insertAdjacentHTML('beforebegin', ev.data);
      });
      source.addEventListener('stream-error', ev => {
        received += 1;
        document.getElementById('loading').insertAdjacentHTML('beforebegin', ev.data);
      });
      source.addEventListener('done', finish);
      source.onerror = finish;
    });
  </script>
</body>
</html>
`;
}
