import PDFDocument from 'pdfkit';
import { Payslip } from '../types';
import { formatAmount, payslipLines, periodLabel } from './payslipHtml';

export function renderPayslipPdf(payslip: Payslip, companyName: string): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const doc = new PDFDocument({ margin: 40, size: 'A4' });
    const chunks: Buffer[] = [];
    doc.on('data', (c: Buffer) => chunks.push(c));
    doc.on('end', () => resolve(Buffer.concat(chunks)));
    doc.on('error', reject);

    const margin = 40;
    const contentWidth = doc.page.width - margin * 2;
    const emp = payslip.employee;
    const p = payslip.payroll;

    doc.fillColor('#0f172a').font('Helvetica-Bold').fontSize(20).text(companyName, { align: 'center' });
    doc.moveDown(0.3);
    doc.fillColor('#059669').fontSize(12).text(`Payslip — ${periodLabel(payslip)}`, { align: 'center' });
    doc.moveDown();

    const field = (label: string, value: string) => {
      doc.font('Helvetica').fontSize(9).fillColor('#64748b').text(label);
      doc.font('Helvetica-Bold').fontSize(11).fillColor('#0f172a').text(value);
      doc.moveDown(0.4);
    };
    field('Employee Name', emp.fullName);
    field('Employee ID', emp.employeeId);
    field('Assigned Client', emp.assignedClientId ?? 'None');
    field('Hours Worked', formatAmount(p.totalHours));

    const line = (label: string, amount: number, bold = false) => {
      const y = doc.y;
      doc.font(bold ? 'Helvetica-Bold' : 'Helvetica').fontSize(10).fillColor('#0f172a');
      doc.text(label, margin, y, { width: contentWidth / 2 });
      doc.text(formatAmount(amount), margin + contentWidth / 2, y, { width: contentWidth / 2, align: 'right' });
      doc.moveDown(0.3);
    };

    doc.moveTo(margin, doc.y).lineTo(margin + contentWidth, doc.y).lineWidth(0.5).strokeColor('#e6e9ee').stroke();
    doc.moveDown(0.5);
    line('Rate per Hour', p.ratePerHour);
    line('Base Salary', p.baseSalary, true);
    for (const l of payslipLines(payslip)) {
      line(l.deducted ? l.label : `${l.label} (not deducted)`, l.amount);
    }
    doc.moveDown(0.5);
    line('Net Pay', p.netSalary, true);

    doc.moveDown(2);
    doc
      .font('Helvetica')
      .fontSize(9)
      .fillColor('#94a3b8')
      .text('This is a system-generated payslip and does not require a signature.', margin, doc.y, {
        align: 'center',
        width: contentWidth
      });

    doc.end();
  });
}
