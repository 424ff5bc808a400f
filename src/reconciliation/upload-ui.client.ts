export const UPLOAD_UI_CLIENT_JS = `const ordersInput = document.getElementById('ordersInput');
const inventoryInput = document.getElementById('inventoryInput');
const locationInput = document.getElementById('locationInput');
const runBtn = document.getElementById('runBtn');
const statusEl = document.getElementById('status');

const sections = {
  fulfillable: { name: 'Fulfillable', file: 'fulfillable.csv' },
  unfulfillable: { name: 'Unfulfillable', file: 'unfulfillable.csv' },
  misc: { name: 'Misc', file: 'misc.csv' },
};

const escapeHtml = (value) => String(value ?? '')
  .replace(/&/g, '&amp;')
  .replace(/</g, '&lt;')
  .replace(/>/g, '&gt;')
  .replace(/"/g, '&quot;');

const tableHtml = (headers, rows) => {
  if (!rows || rows.length === 0) return '<span class="muted">None</span>';
  const head = headers.map((h) => '<th>' + escapeHtml(h) + '</th>').join('');
  const body = rows.map((r) => '<tr>' +
    headers.map((h) => '<td>' + escapeHtml(r[h]) + '</td>').join('') +
  '</tr>').join('');
  return '<table><thead><tr>' + head + '</tr></thead><tbody>' + body + '</tbody></table>';
};

const showDownload = (key, csv) => {
  const link = document.getElementById('download' + sections[key].name);
  if (link.href) URL.revokeObjectURL(link.href);
  link.href = URL.createObjectURL(new Blob([csv], { type: 'text/csv' }));
  link.download = sections[key].file;
  link.hidden = false;
};

runBtn.addEventListener('click', async () => {
  const orders = ordersInput.files && ordersInput.files[0];
  if (!orders) {
    statusEl.textContent = 'Please choose an orders file first.';
    statusEl.className = 'status err';
    return;
  }

  const formData = new FormData();
  formData.append('orders', orders);
  const inventory = inventoryInput.files && inventoryInput.files[0];
  if (inventory) formData.append('inventory', inventory);
  if (locationInput.value.trim()) formData.append('locationIds', locationInput.value.trim());

  runBtn.disabled = true;
  statusEl.textContent = 'Loading inventory and reconciling...';
  statusEl.className = 'status muted';

  try {
    const res = await fetch('/reconciliation/run', { method: 'POST', body: formData });
    const data = await res.json().catch(() => ({}));

    if (!res.ok) {
      const message = Array.isArray(data.message) ? data.message.join('; ') : data.message;
      statusEl.textContent = message || 'Reconciliation failed.';
      statusEl.className = 'status err';
      return;
    }

    const headers = Array.isArray(data.headers) ? data.headers : [];
    Object.keys(sections).forEach((key) => {
      const rows = Array.isArray(data[key]) ? data[key] : [];
      const columns = key === 'fulfillable' && !headers.includes('sku_qty')
        ? headers.concat('sku_qty')
        : headers;
      document.getElementById('count' + sections[key].name).textContent = String(rows.length);
      document.getElementById(key + 'Wrap').innerHTML = tableHtml(columns, rows);
      showDownload(key, (data.csv && data.csv[key]) || '');
    });

    statusEl.textContent = 'Completed. ' + data.summary.total + ' orders reconciled.';
    statusEl.className = 'status ok';
  } catch (error) {
    statusEl.textContent = 'Network/server error during reconciliation.';
    statusEl.className = 'status err';
  } finally {
    runBtn.disabled = false;
  }
});
`;
