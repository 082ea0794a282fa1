export function getConsoleHtml(title: string = 'imsg-relay console'): string {
  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(title)}</title>
<style>
  :root {
    --bg: #0f1117;
    --surface: #1a1d27;
    --surface2: #242734;
    --border: #2e3244;
    --text: #e1e4ed;
    --text-dim: #8b8fa3;
    --primary: #6c8cff;
    --success: #4ade80;
    --warning: #fbbf24;
    --error: #f87171;
    --radius: 8px;
  }
  * { margin: 0; padding: 0; box-sizing: border-box; }
  body {
    font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif;
    background: var(--bg);
    color: var(--text);
    padding: 24px;
  }
  h1 { font-size: 20px; margin-bottom: 16px; }
  h2 { font-size: 15px; margin-bottom: 12px; color: var(--text-dim); text-transform: uppercase; letter-spacing: .05em; }
  .grid { display: grid; grid-template-columns: 380px 1fr; gap: 16px; }
  .panel { background: var(--surface); border: 1px solid var(--border); border-radius: var(--radius); padding: 16px; margin-bottom: 16px; }
  label { display: block; font-size: 12px; color: var(--text-dim); margin: 10px 0 4px; }
  input, textarea {
    width: 100%; padding: 8px; background: var(--surface2); color: var(--text);
    border: 1px solid var(--border); border-radius: 6px; font: inherit;
  }
  textarea { height: 90px; resize: vertical; }
  button {
    margin-top: 12px; margin-right: 6px; padding: 8px 14px; border: none; border-radius: 6px;
    background: var(--primary); color: #fff; cursor: pointer;
  }
  button.secondary { background: var(--surface2); border: 1px solid var(--border); }
  .status { margin-top: 10px; font-size: 13px; min-height: 18px; }
  .status.success { color: var(--success); }
  .status.error { color: var(--error); }
  .conv { padding: 8px; border-radius: 6px; cursor: pointer; display: flex; justify-content: space-between; }
  .conv:hover, .conv.active { background: var(--surface2); }
  .badge { font-size: 11px; color: var(--text-dim); }
  .badge.busy { color: var(--warning); }
  .msg { margin: 6px 0; padding: 8px 10px; border-radius: 6px; background: var(--surface2); border-left: 3px solid var(--primary); white-space: pre-wrap; }
  .msg.user { border-left-color: var(--success); }
  .msg .meta { font-size: 11px; color: var(--text-dim); margin-bottom: 2px; }
  .msg.failed { border-left-color: var(--error); }
  table { width: 100%; border-collapse: collapse; font-size: 12px; }
  td, th { text-align: left; padding: 6px; border-bottom: 1px solid var(--border); vertical-align: top; }
  td.err { color: var(--error); }
  #loop { font-size: 12px; color: var(--text-dim); margin-bottom: 16px; }
</style>
</head>
<body>
<h1>${escapeHtml(title)}</h1>
<div id="loop">connecting…</div>
<div class="grid">
  <div>
    <div class="panel">
      <h2>Runtime config</h2>
      <label for="apiKey">API key</label><input id="apiKey" type="password" autocomplete="off">
      <label for="apiUrl">API URL</label><input id="apiUrl">
      <label for="modelName">Model</label><input id="modelName">
      <label for="systemPrompt">System prompt</label><textarea id="systemPrompt"></textarea>
      <label for="temperature">Temperature (0 – 1.5)</label><input id="temperature" type="number" min="0" max="1.5" step="0.1">
      <label for="maxHistory">History depth (1 – 50)</label><input id="maxHistory" type="number" min="1" max="50">
      <button onclick="saveConfig()">Save</button>
      <button class="secondary" onclick="testConfig()">Test connection</button>
      <div id="configStatus" class="status"></div>
    </div>
    <div class="panel">
      <h2>Conversations</h2>
      <div id="convList"></div>
      <button class="secondary" onclick="clearHistory(null)">Clear all history</button>
    </div>
  </div>
  <div>
    <div class="panel">
      <h2 id="historyTitle">History</h2>
      <div id="history"><div class="badge">Select a conversation</div></div>
      <button class="secondary" id="clearOne" style="display:none" onclick="clearHistory(selected)">Clear this conversation</button>
    </div>
    <div class="panel">
      <h2>Call log</h2>
      <table><thead><tr><th>Time</th><th>Peer</th><th>Request</th><th>Response</th><th>ms</th><th>Outcome</th></tr></thead>
      <tbody id="calls"></tbody></table>
    </div>
  </div>
</div>
<script>
  var selected = null;
  var fields = ['apiKey', 'apiUrl', 'modelName', 'systemPrompt', 'temperature', 'maxHistory'];

  function escapeHtml(s) {
    return String(s).replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
  }

  function setStatus(text, cls) {
    var el = document.getElementById('configStatus');
    el.textContent = text;
    el.className = 'status ' + (cls || '');
  }

  function formValues() {
    return {
      apiKey: document.getElementById('apiKey').value,
      apiUrl: document.getElementById('apiUrl').value,
      modelName: document.getElementById('modelName').value,
      systemPrompt: document.getElementById('systemPrompt').value,
      temperature: parseFloat(document.getElementById('temperature').value),
      maxHistory: parseInt(document.getElementById('maxHistory').value, 10)
    };
  }

  function fillForm(cfg) {
    fields.forEach(function (f) { document.getElementById(f).value = cfg[f]; });
  }

  async function loadConfig() {
    var res = await fetch('/api/config');
    fillForm(await res.json());
  }

  async function saveConfig() {
    var res = await fetch('/api/config', {
      method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(formValues())
    });
    var data = await res.json();
    if (res.ok) { fillForm(data.config); setStatus('Saved', 'success'); }
    else { setStatus(data.error || 'Save failed', 'error'); }
  }

  async function testConfig() {
    setStatus('Testing…');
    var res = await fetch('/api/config/test', {
      method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(formValues())
    });
    var data = await res.json();
    if (data.status === 'success') setStatus('OK (' + data.latencyMs + ' ms): ' + data.response, 'success');
    else setStatus((data.kind ? data.kind + ': ' : '') + (data.error || 'failed'), 'error');
  }

  async function loadConversations() {
    var res = await fetch('/api/conversations');
    var data = await res.json();
    document.getElementById('convList').innerHTML = data.conversations.map(function (c) {
      var badge = c.inFlight ? '<span class="badge busy">replying</span>' : '<span class="badge">' + c.messageCount + '</span>';
      return '<div class="conv' + (c.peer === selected ? ' active' : '') + '" data-peer="' + escapeHtml(c.peer) + '">' +
        '<span>' + escapeHtml(c.peer) + '</span>' + badge + '</div>';
    }).join('') || '<div class="badge">No conversations yet</div>';
    document.querySelectorAll('.conv').forEach(function (el) {
      el.onclick = function () { selectPeer(el.getAttribute('data-peer')); };
    });
  }

  async function selectPeer(peer) {
    selected = peer;
    document.getElementById('historyTitle').textContent = 'History: ' + peer;
    document.getElementById('clearOne').style.display = 'inline-block';
    await Promise.all([loadHistory(), loadConversations()]);
  }

  async function loadHistory() {
    if (!selected) return;
    var res = await fetch('/api/history?peer=' + encodeURIComponent(selected));
    var data = await res.json();
    document.getElementById('history').innerHTML = data.messages.map(function (m) {
      var failed = m.delivery === 'failed' ? ' failed' : '';
      var meta = new Date(m.ts).toLocaleString() + ' · ' + m.role + (m.delivery ? ' · ' + m.delivery : '');
      return '<div class="msg ' + m.role + failed + '"><div class="meta">' + escapeHtml(meta) + '</div>' + escapeHtml(m.content) + '</div>';
    }).join('') || '<div class="badge">Empty</div>';
  }

  async function loadCalls() {
    var res = await fetch('/api/calls?limit=30');
    var data = await res.json();
    document.getElementById('calls').innerHTML = data.entries.map(function (e) {
      var outcome = e.errorKind ? '<td class="err">' + escapeHtml(e.errorKind + ': ' + (e.error || '')) + '</td>' : '<td>ok</td>';
      return '<tr><td>' + escapeHtml(new Date(e.ts).toLocaleTimeString()) + '</td><td>' + escapeHtml(e.conversationId) +
        '</td><td>' + escapeHtml(e.requestSummary) + '</td><td>' + escapeHtml(e.responseSummary) +
        '</td><td>' + e.latencyMs + '</td>' + outcome + '</tr>';
    }).join('');
  }

  async function clearHistory(peer) {
    await fetch('/api/history/clear', {
      method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify({ peer: peer })
    });
    await Promise.all([loadHistory(), loadConversations()]);
  }

  function connectEvents() {
    var es = new EventSource('/api/events');
    es.addEventListener('message', function (ev) {
      var data = JSON.parse(ev.data);
      if (data.peer === selected) loadHistory();
      loadConversations();
    });
    es.addEventListener('call', loadCalls);
    es.addEventListener('config', loadConfig);
    es.addEventListener('cycle', function (ev) {
      var c = JSON.parse(ev.data);
      document.getElementById('loop').textContent = 'Last poll ' + new Date(c.finishedAt).toLocaleTimeString() +
        ' · fetched ' + c.fetched + ' · started ' + c.started + ' · deferred ' + c.deferred + (c.skipped ? ' · skipped: ' + c.skipped : '');
    });
    es.onerror = function () { document.getElementById('loop').textContent = 'disconnected, retrying…'; };
  }

  loadConfig();
  loadConversations();
  loadCalls();
  connectEvents();
</script>
</body>
</html>`;
}

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
