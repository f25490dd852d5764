export function buildStatusPage(wsPath: string): string {
  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
  <title>Live VLM Relay</title>
  <style>
    body { font-family: system-ui, sans-serif; margin: 28px; background: #f6f8fb; color: #111; }
    .container { max-width: 980px; margin: 0 auto; }
    .header { display: flex; align-items: center; justify-content: space-between; gap: 16px; }
    .result { font-size: 26px; font-weight: 600; margin: 12px 0; white-space: pre-line; }
    .chip { background: #111; color: #fff; padding: 6px 10px; border-radius: 999px; font-size: 12px; }
    .chip.busy { background: #f59e0b; }
    .grid { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 12px; margin-top: 16px; }
    .panel { background: #fff; padding: 14px; border-radius: 12px; box-shadow: 0 6px 18px rgba(15, 23, 42, 0.08); }
    .value { font-size: 22px; font-weight: 600; }
    .spark { font-family: ui-monospace, SFMono-Regular, Menlo, Monaco, Consolas, monospace; font-size: 14px; letter-spacing: 1px; }
    .muted { color: #6b7280; font-size: 12px; }
  </style>
</head>
<body>
  <div class="container">
    <div class="header">
      <h1>Live VLM Relay</h1>
      <span class="chip" id="status">Ready</span>
    </div>
    <div class="muted" id="meta">Frames over ws://host${wsPath}</div>
    <div class="result" id="result">Waiting for first result...</div>
    <div class="grid">
      <div class="panel"><div class="muted">Latency (last / mean)</div><div class="value" id="latency">--</div></div>
      <div class="panel"><div class="muted">Results</div><div class="value" id="count">0</div></div>
      <div class="panel"><div class="muted">GPU</div><div class="value" id="gpu">--</div><div class="spark" id="gpuSpark"></div></div>
      <div class="panel"><div class="muted">VRAM</div><div class="value" id="vram">--</div><div class="spark" id="vramSpark"></div></div>
      <div class="panel"><div class="muted">CPU</div><div class="value" id="cpu">--</div><div class="spark" id="cpuSpark"></div></div>
      <div class="panel"><div class="muted">RAM</div><div class="value" id="ram">--</div><div class="spark" id="ramSpark"></div></div>
    </div>
    <div class="panel" style="margin-top: 16px;">
      <div class="muted">Platform</div>
      <div id="platform">--</div>
    </div>
  </div>
  <script>
    const bars = '▁▂▃▄▅▆▇█';
    const spark = (values, max) => values
      .map(v => v === null ? ' ' : bars[Math.min(bars.length - 1, Math.floor((v / (max || 1)) * bars.length))])
      .join('');
    const fmt = (v, unit) => v === null || v === undefined ? 'N/A' : v + unit;
    const render = (data) => {
      const inference = data.inference;
      const result = document.getElementById('result');
      if (inference) {
        result.textContent = inference.status === 'ok' ? inference.text : 'Error: ' + inference.error.message;
        document.getElementById('meta').textContent = inference.model + ' · frame ' + inference.frame_seq;
      }
      const status = document.getElementById('status');
      status.textContent = data.processing ? 'Processing...' : 'Ready';
      status.className = data.processing ? 'chip busy' : 'chip';
      const latency = data.latency;
      document.getElementById('latency').textContent = latency.last_ms === null
        ? '--'
        : latency.last_ms + ' / ' + Math.round(latency.mean_ms) + ' ms';
      document.getElementById('count').textContent = String(latency.count);
      const t = data.telemetry;
      if (t) {
        document.getElementById('gpu').textContent = fmt(t.gpu_percent, '%');
        document.getElementById('vram').textContent = fmt(t.vram_used_gb, ' GB');
        document.getElementById('cpu').textContent = fmt(t.cpu_percent, '%');
        document.getElementById('ram').textContent = fmt(t.ram_used_gb, ' GB');
        document.getElementById('platform').textContent = t.platform + (t.gpu_name ? ' · ' + t.gpu_name : '') + ' · ' + t.status;
        document.getElementById('gpuSpark').textContent = spark(data.history.gpu_util, 100);
        document.getElementById('vramSpark').textContent = spark(data.history.vram_used, t.vram_total_gb);
        document.getElementById('cpuSpark').textContent = spark(data.history.cpu_util, 100);
        document.getElementById('ramSpark').textContent = spark(data.history.ram_used, t.ram_total_gb);
      }
    };
    const poll = async () => {
      try {
        const res = await fetch('/snapshot.json');
        render(await res.json());
      } catch (err) {
        document.getElementById('platform').textContent = 'Server unreachable';
      }
    };
    poll();
    setInterval(poll, 1000);
  </script>
</body>
</html>`;
}
