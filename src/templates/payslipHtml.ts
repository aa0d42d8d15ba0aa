import { format, parseISO } from 'date-fns';
import { Payslip } from '../types';
import { roundCurrency } from '../services/payrollService';

export function escapeHtml(s: unknown) {
  if (s === null || s === undefined) return '';
  return String(s)
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export const formatAmount = (n: number) => roundCurrency(n).toFixed(2);

export function periodLabel(payslip: Payslip) {
  const start = format(parseISO(payslip.period.start), 'd MMM yyyy');
  const end = format(parseISO(payslip.period.end), 'd MMM yyyy');
  return `${start} – ${end}`;
}

/** Rows in display order; `deducted` marks the lines subtracted from net pay. */
export function payslipLines(payslip: Payslip) {
  const p = payslip.payroll;
  return [
    { label: 'Retirement Benefit 1 (12%)', amount: p.retirementBenefit1, deducted: true },
    { label: 'Retirement Benefit 2 (13%)', amount: p.retirementBenefit2, deducted: false },
    { label: 'Insurance 1 (5%)', amount: p.insurance1, deducted: true },
    { label: 'Insurance 2 (5%)', amount: p.insurance2, deducted: false }
  ];
}

export function buildPayslipHtml(payslip: Payslip, companyName: string) {
  const emp = payslip.employee;
  const p = payslip.payroll;
  const rows = payslipLines(payslip)
    .map(
      (l) => `
            <div class="row"><div>${escapeHtml(l.label)}${l.deducted ? '' : ' <span class="note">not deducted</span>'}</div><div>${formatAmount(l.amount)}</div></div>`
    )
    .join('');

  return `
  <!doctype html>
  <html>
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width,initial-scale=1" />
    <style>
      body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Roboto, Arial; background:#f8fafc; color:#0f172a; margin:0; padding:20px; }
      #printable-area { max-width:720px; margin:0 auto; background:#fff; border:1px solid #e6e9ee; border-radius:14px; padding:32px; }
      .header { text-align:center; border-bottom:1px solid #e6e9ee; padding-bottom:16px; margin-bottom:16px; }
      .header h1 { margin:0; font-size:20px; }
      .details { display:grid; grid-template-columns:1fr 1fr; gap:12px 20px; margin-bottom:20px; font-size:13px; }
      .label { font-size:10px; color:#64748b; text-transform:uppercase; letter-spacing:1px; }
      .value { font-weight:700; margin-top:4px; }
      .text-right { text-align:right; }
      .box { border:1px solid #e6e9ee; border-radius:10px; padding:14px; margin-bottom:20px; font-size:13px; }
      .row { display:flex; justify-content:space-between; margin:8px 0; }
      .note { color:#94a3b8; font-size:10px; text-transform:uppercase; }
      .net-band { display:flex; justify-content:space-between; background:#ecfdf5; border:1px solid #d1fae5; padding:14px; border-radius:10px; font-weight:800; }
      .net-band .amount { font-size:22px; color:#065f46; }
      .footer { font-size:10px; color:#94a3b8; text-align:center; margin-top:18px; }
      @media print { body { background:#fff; padding:0; } #printable-area { border:none; } }
    </style>
  </head>
  <body>
    <div id="printable-area">
      <div class="header">
        <h1>${escapeHtml(companyName)}</h1>
        <div>Payslip — ${escapeHtml(periodLabel(payslip))}</div>
      </div>

      <div class="details">
        <div><div class="label">Employee Name</div><div class="value">${escapeHtml(emp.fullName)}</div></div>
        <div class="text-right"><div class="label">Employee ID</div><div class="value">${escapeHtml(emp.employeeId)}</div></div>
        <div><div class="label">Assigned Client</div><div class="value">${escapeHtml(emp.assignedClientId ?? 'None')}</div></div>
        <div class="text-right"><div class="label">Hours Worked</div><div class="value">${formatAmount(p.totalHours)}</div></div>
      </div>

      <div class="box">
        <div class="row"><div>Rate per Hour</div><div>${formatAmount(p.ratePerHour)}</div></div>
        <div class="row"><div><strong>Base Salary</strong></div><div><strong>${formatAmount(p.baseSalary)}</strong></div></div>${rows}
      </div>

      <div class="net-band">
        <div>Net Pay</div>
        <div class="amount">${formatAmount(p.netSalary)}</div>
      </div>

      <div class="footer">Generated ${escapeHtml(payslip.generatedAt)}. This is a system-generated payslip and does not require a signature.</div>
    </div>
  </body>
  </html>
  `;
}
