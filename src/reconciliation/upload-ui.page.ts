export const UPLOAD_UI_HTML = `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width,initial-scale=1" />
  <title>Order Reconciliation</title>
  <style>
    :root { font-family: "Segoe UI", Tahoma, sans-serif; color-scheme: light; }
    body { margin: 0; background: #f6f8fb; color: #1f2937; }
    .wrap { max-width: 1080px; margin: 32px auto; padding: 0 16px; }
    .card { background: #fff; border: 1px solid #dbe3ef; border-radius: 12px; padding: 16px; margin-bottom: 16px; overflow-x: auto; }
    h1 { margin: 0 0 12px; font-size: 24px; }
    .row { display: flex; gap: 10px; align-items: center; flex-wrap: wrap; margin-bottom: 8px; }
    label { min-width: 150px; }
    button { background: #1165d8; color: #fff; border: 0; border-radius: 8px; padding: 10px 14px; cursor: pointer; }
    button[disabled] { opacity: .5; cursor: not-allowed; }
    a.download { font-size: 14px; margin-left: 8px; }
    .muted { color: #5f6f82; font-size: 14px; }
    .status { font-weight: 600; }
    .ok { color: #0f766e; }
    .err { color: #b91c1c; }
    .grid { display: grid; grid-template-columns: repeat(3, minmax(0, 1fr)); gap: 12px; }
    .pill { border-radius: 10px; padding: 10px 12px; border: 1px solid #dbe3ef; }
    table { width: 100%; border-collapse: collapse; font-size: 14px; }
    th, td { text-align: left; border-bottom: 1px solid #e9eef6; padding: 8px 6px; }
    th { background: #f7f9fc; }
    @media (max-width: 840px) { .grid { grid-template-columns: 1fr; } }
  </style>
</head>
<body>
  <div class="wrap">
    <div class="card">
      <h1>Order Reconciliation</h1>
      <div class="row">
        <label for="ordersInput">Orders (CSV/XLSX)</label>
        <input id="ordersInput" type="file" accept=".csv,.xlsx,.xls" />
      </div>
      <div class="row">
        <label for="inventoryInput">Inventory snapshot</label>
        <input id="inventoryInput" type="file" accept=".json" />
      </div>
      <div class="row">
        <label for="locationInput">Location ids</label>
        <input id="locationInput" type="text" placeholder="e.g. 12345,67890" />
      </div>
      <div class="row">
        <button id="runBtn">Run</button>
        <span id="status" class="status muted">Select an orders file to begin</span>
      </div>
      <p class="muted">Orders need a custom_label column such as "[..]/[..] 0123456*2, 0456789*1". Without a snapshot, inventory is fetched from the inventory API.</p>
    </div>

    <div class="card">
      <div class="grid">
        <div class="pill">Fulfillable: <strong id="countFulfillable">0</strong></div>
        <div class="pill">Unfulfillable: <strong id="countUnfulfillable">0</strong></div>
        <div class="pill">Misc: <strong id="countMisc">0</strong></div>
      </div>
    </div>

    <div class="card">
      <h3>Fulfillable Orders <a id="downloadFulfillable" class="download" hidden>Download CSV</a></h3>
      <div id="fulfillableWrap" class="muted">No fulfillable orders yet.</div>
    </div>

    <div class="card">
      <h3>Unfulfillable Orders <a id="downloadUnfulfillable" class="download" hidden>Download CSV</a></h3>
      <div id="unfulfillableWrap" class="muted">No unfulfillable orders yet.</div>
    </div>

    <div class="card">
      <h3>Misc Orders <a id="downloadMisc" class="download" hidden>Download CSV</a></h3>
      <div id="miscWrap" class="muted">No misc orders yet.</div>
    </div>
  </div>

  <script src="/reconciliation/upload-ui.js"></script>
</body>
</html>
`;
