import { Router } from 'express';
import { format, parseISO } from 'date-fns';
import { fromZodError, sendError } from '../errors';
import { asyncRoute, authRequired, requireRole, requireSelfOrCeo } from '../middleware/auth';
import { Mailer, SmtpNotConfiguredError } from '../services/mailer';
import { PayrollService, roundBreakdown } from '../services/payrollService';
import { buildPayslipHtml } from '../templates/payslipHtml';
import { renderPayslipPdf } from '../templates/payslipPdf';
import { Payslip } from '../types';
import { payslipEmailSchema, periodQuerySchema } from '../validation/schemas';

const payslipFilename = (p: Payslip) =>
  `payslip-${p.employee.employeeId}-${format(parseISO(p.period.start), 'yyyy-MM')}.pdf`;

export default function payrollRouter(deps: {
  payroll: PayrollService;
  mailer: Mailer;
  companyName: string;
  jwtSecret: string;
}) {
  const router = Router();
  router.use(authRequired(deps.jwtSecret));

  router.get(
    '/:employeeId',
    requireSelfOrCeo('employeeId'),
    asyncRoute(async (req, res) => {
      const period = periodQuerySchema.safeParse(req.query);
      if (!period.success) return sendError(res, fromZodError(period.error));

      const range = deps.payroll.resolvePeriod(period.data);
      const result = await deps.payroll.computeSalary(req.params.employeeId, range);
      if (!result.ok) return sendError(res, result.error);
      return res.json({
        employeeId: req.params.employeeId,
        period: { start: range.start.toISOString(), end: range.end.toISOString() },
        payroll: result.value ? roundBreakdown(result.value) : null
      });
    })
  );

  router.get(
    '/:employeeId/payslip',
    requireSelfOrCeo('employeeId'),
    asyncRoute(async (req, res) => {
      const period = periodQuerySchema.safeParse(req.query);
      if (!period.success) return sendError(res, fromZodError(period.error));

      const result = await deps.payroll.payslipFor(req.params.employeeId, period.data);
      if (!result.ok) return sendError(res, result.error);
      if (!result.value) return res.status(404).json({ message: 'No hourly rate configured', kind: 'MissingRate' });
      const payslip = result.value;

      if (req.query.format === 'pdf') {
        const pdf = await renderPayslipPdf(payslip, deps.companyName);
        res.setHeader('Content-Type', 'application/pdf');
        res.setHeader('Content-Disposition', `attachment; filename=${payslipFilename(payslip)}`);
        res.setHeader('Content-Length', pdf.length.toString());
        return res.end(pdf);
      }
      res.setHeader('Content-Type', 'text/html; charset=utf-8');
      return res.send(buildPayslipHtml(payslip, deps.companyName));
    })
  );

  router.post(
    '/:employeeId/email',
    requireRole('CEO'),
    asyncRoute(async (req, res) => {
      const body = payslipEmailSchema.safeParse(req.body ?? {});
      if (!body.success) return sendError(res, fromZodError(body.error));
      const period = periodQuerySchema.safeParse(req.query);
      if (!period.success) return sendError(res, fromZodError(period.error));

      const result = await deps.payroll.payslipFor(req.params.employeeId, period.data);
      if (!result.ok) return sendError(res, result.error);
      if (!result.value) return res.status(404).json({ message: 'No hourly rate configured', kind: 'MissingRate' });
      const payslip = result.value;

      const to = body.data.to ?? payslip.employee.email;
      if (!to) return res.status(400).json({ message: 'No recipient: pass "to" or set the employee email' });

      const pdf = await renderPayslipPdf(payslip, deps.companyName);
      try {
        await deps.mailer.send({
          to,
          subject: body.data.subject ?? `Payslip ${format(parseISO(payslip.period.start), 'MMMM yyyy')}`,
          text: body.data.text ?? `Please find attached your payslip for ${format(parseISO(payslip.period.start), 'MMMM yyyy')}`,
          attachments: [{ filename: payslipFilename(payslip), content: pdf }]
        });
      } catch (err) {
        if (err instanceof SmtpNotConfiguredError) {
          return res.status(503).json({ ok: false, message: err.message, pdfGenerated: true });
        }
        console.error('Payslip email failed', err);
        return res.status(500).json({ message: 'Email failed', error: String(err) });
      }
      return res.json({ ok: true, message: 'Email sent successfully', to });
    })
  );

  return router;
}
