import { Employee } from './Employee';
import { Attendance } from './Attendance';
import { Client } from './Client';
import { Installment } from './Installment';

export { Employee, Attendance, Client, Installment };

export const entities = [Employee, Attendance, Client, Installment];
