import 'reflect-metadata';
import * as path from 'path';
import { z } from 'zod';
import AppDataSource from '../ormconfig';
import { env } from '../config/env';
import { createServices } from '../app';
import { systemClock } from '../services/clock';
import { DiskPhotoStore } from '../services/photoStore';
import { describeError } from '../errors';
import seedData from './data.json';

const text = z.string().optional();

const seedSchema = z.object({
  clients: z
    .array(
      z.object({
        clientId: text,
        orgName: z.string(),
        description: text,
        requirements: text,
        companyContact: text,
        companyEmail: text,
        personInChargeName: text,
        personInChargePhone: text,
        personInChargeEmail: text,
        companyType: z.enum(['GEM', 'NON-GEM']).optional(),
        totalBill: z.number()
      })
    )
    .default([]),
  employees: z
    .array(
      z.object({
        employeeId: text,
        fullName: z.string(),
        contactNumber: text,
        email: text,
        role: z.enum(['CEO', 'Employee']).optional(),
        password: z.string(),
        assignedClientId: text,
        ratePerHour: z.number().optional()
      })
    )
    .default([])
});

async function runSeed() {
  await AppDataSource.initialize();
  await AppDataSource.runMigrations();
  console.log('DataSource initialized for seeding');

  const seed = seedSchema.parse(seedData);
  const { employees, billing } = createServices({
    dataSource: AppDataSource,
    clock: systemClock,
    photos: new DiskPhotoStore(path.resolve(process.cwd(), env.UPLOAD_DIR)),
    bcryptRounds: env.BCRYPT_ROUNDS
  });

  // clients first so assignments below can reference them
  let clientsInserted = 0;
  for (const c of seed.clients) {
    const result = await billing.registerClient(c);
    if (result.ok) clientsInserted++;
    else console.log(`Skipped client: ${describeError(result.error)}`);
  }

  let empInserted = 0;
  for (const e of seed.employees) {
    const result = await employees.registerEmployee(e);
    if (!result.ok) {
      console.log(`Skipped employee: ${describeError(result.error)}`);
      continue;
    }
    empInserted++;
    const { assignedClientId, ratePerHour } = e;
    if (assignedClientId !== undefined && ratePerHour !== undefined) {
      const assigned = await employees.assignToClient(result.value.employeeId, { clientId: assignedClientId, ratePerHour });
      if (!assigned.ok) console.log(`Assignment skipped: ${describeError(assigned.error)}`);
    }
  }

  console.log(`Seeding complete. Employees inserted: ${empInserted}, Clients inserted: ${clientsInserted}`);
  await AppDataSource.destroy();
}

if (require.main === module) {
  runSeed().catch((err) => {
    console.error('Seed failed', err);
    process.exit(1);
  });
}
