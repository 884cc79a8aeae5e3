/**
 * Querywise - Demo Database Seeder
 *
 * Creates the SQLite files named in the `databases` configuration section and
 * fills them with deterministic sample data. Existing files are replaced.
 *
 * Usage: npm run db:seed
 */

import 'dotenv/config';

import fs from 'fs';
import path from 'path';

import Database from 'better-sqlite3';

import { loadConfig } from '../config/loader.js';
import logger from '../utils/logger.js';

// =============================================================================
// Sample Values
// =============================================================================

const FIRST_NAMES = ['Avery', 'Jordan', 'Riley', 'Morgan', 'Casey', 'Taylor', 'Quinn', 'Reese', 'Harper', 'Rowan'];
const LAST_NAMES = ['Lee', 'Patel', 'Garcia', 'Nguyen', 'Okafor', 'Schmidt', 'Rossi', 'Kowalski', 'Silva', 'Brennan'];
const ROLES = ['Captain', 'First Officer', 'Flight Attendant', 'Purser'];
const STATUSES = ['Active', 'Active', 'Active', 'On Leave', 'Training'];
const AIRPORTS: Array<[string, string, string]> = [
  ['DFW', 'Dallas/Fort Worth International', 'Dallas'],
  ['ORD', "O'Hare International", 'Chicago'],
  ['MIA', 'Miami International', 'Miami'],
  ['LAX', 'Los Angeles International', 'Los Angeles'],
  ['JFK', 'John F. Kennedy International', 'New York'],
  ['PHX', 'Phoenix Sky Harbor International', 'Phoenix'],
];
const AIRCRAFT_TYPES: Array<[string, number]> = [
  ['B737', 172],
  ['A321', 190],
  ['B787', 285],
];

const CREW_COUNT = 60;
const FLIGHT_COUNT = 80;

function pick<T>(values: readonly T[], index: number): T {
  const value = values[index % values.length];
  if (value === undefined) {
    throw new Error('Cannot pick from an empty list');
  }
  return value;
}

function employeeId(index: number): string {
  return `AA-${10001 + index}`;
}

function isoDate(year: number, dayOfYear: number): string {
  return new Date(Date.UTC(year, 0, 1 + dayOfYear)).toISOString().slice(0, 10);
}

// =============================================================================
// Builders
// =============================================================================

function seedCrewManagement(db: Database.Database): void {
  db.exec(`
    CREATE TABLE crew_members (
      employee_id TEXT PRIMARY KEY,
      first_name TEXT NOT NULL,
      last_name TEXT NOT NULL,
      crew_role TEXT NOT NULL,
      base_airport TEXT NOT NULL,
      hire_date TEXT NOT NULL,
      status TEXT NOT NULL,
      update_time TEXT
    );
    CREATE TABLE crew_qualifications (
      qualification_id INTEGER PRIMARY KEY,
      employee_id TEXT NOT NULL REFERENCES crew_members(employee_id),
      qualification_type TEXT NOT NULL,
      aircraft_type TEXT,
      expiry_date TEXT
    );
    CREATE TABLE crew_assignments (
      assignment_id INTEGER PRIMARY KEY,
      employee_id TEXT NOT NULL REFERENCES crew_members(employee_id),
      flight_id INTEGER NOT NULL,
      duty_role TEXT NOT NULL,
      duty_hours REAL
    );
  `);

  const member = db.prepare(
    'INSERT INTO crew_members VALUES (@employee_id, @first_name, @last_name, @crew_role, @base_airport, @hire_date, @status, @update_time)'
  );
  const qualification = db.prepare(
    'INSERT INTO crew_qualifications (employee_id, qualification_type, aircraft_type, expiry_date) VALUES (?, ?, ?, ?)'
  );
  const assignment = db.prepare(
    'INSERT INTO crew_assignments (employee_id, flight_id, duty_role, duty_hours) VALUES (?, ?, ?, ?)'
  );

  db.transaction(() => {
    for (let i = 0; i < CREW_COUNT; i++) {
      const role = pick(ROLES, i);
      member.run({
        employee_id: employeeId(i),
        first_name: pick(FIRST_NAMES, i),
        last_name: pick(LAST_NAMES, Math.floor(i / FIRST_NAMES.length) + i),
        crew_role: role,
        base_airport: pick(AIRPORTS, Math.floor(i / ROLES.length))[0],
        hire_date: isoDate(2008 + (i % 15), (i * 37) % 360),
        status: pick(STATUSES, i),
        update_time: `${isoDate(2024, i % 300)} 08:00:00`,
      });

      const aircraftType = pick(AIRCRAFT_TYPES, i)[0];
      qualification.run(employeeId(i), 'Type Rating', role === 'Captain' || role === 'First Officer' ? aircraftType : null, isoDate(2026, i * 5));
      qualification.run(employeeId(i), 'Medical', null, isoDate(2025, 100 + i * 3));

      for (let leg = 0; leg < 4; leg++) {
        assignment.run(employeeId(i), 1 + ((i * 4 + leg) % FLIGHT_COUNT), role, 2.5 + ((i + leg) % 6) * 1.25);
      }
    }
  })();
}

function seedFlightOperations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE airports (
      airport_code TEXT PRIMARY KEY,
      airport_name TEXT NOT NULL,
      city TEXT NOT NULL,
      country TEXT NOT NULL
    );
    CREATE TABLE aircraft (
      aircraft_id INTEGER PRIMARY KEY,
      registration TEXT NOT NULL,
      aircraft_type TEXT NOT NULL,
      seats INTEGER NOT NULL
    );
    CREATE TABLE flights (
      flight_id INTEGER PRIMARY KEY,
      flight_number TEXT NOT NULL,
      origin TEXT NOT NULL REFERENCES airports(airport_code),
      destination TEXT NOT NULL REFERENCES airports(airport_code),
      departure_date TEXT NOT NULL,
      aircraft_id INTEGER REFERENCES aircraft(aircraft_id),
      status TEXT NOT NULL,
      delay_minutes INTEGER
    );
  `);

  const airport = db.prepare('INSERT INTO airports VALUES (?, ?, ?, ?)');
  const aircraft = db.prepare('INSERT INTO aircraft (registration, aircraft_type, seats) VALUES (?, ?, ?)');
  const flight = db.prepare(
    'INSERT INTO flights (flight_number, origin, destination, departure_date, aircraft_id, status, delay_minutes) VALUES (?, ?, ?, ?, ?, ?, ?)'
  );
  const flightStatuses = ['Arrived', 'Arrived', 'Departed', 'Scheduled', 'Cancelled'];

  db.transaction(() => {
    for (const [code, name, city] of AIRPORTS) {
      airport.run(code, name, city, 'United States');
    }
    for (let i = 0; i < 12; i++) {
      const [type, seats] = pick(AIRCRAFT_TYPES, i);
      aircraft.run(`N${100 + i}QW`, type, seats);
    }
    for (let i = 0; i < FLIGHT_COUNT; i++) {
      const origin = pick(AIRPORTS, i)[0];
      const destination = pick(AIRPORTS, i + 1 + (i % 3))[0];
      const status = pick(flightStatuses, i);
      flight.run(
        `QW${1000 + i}`,
        origin,
        destination,
        isoDate(2024, 150 + (i % 45)),
        1 + (i % 12),
        status,
        status === 'Cancelled' ? null : (i * 7) % 55
      );
    }
  })();
}

function seedHrPayroll(db: Database.Database): void {
  db.exec(`
    CREATE TABLE payroll_records (
      payroll_id INTEGER PRIMARY KEY,
      employee_id TEXT NOT NULL,
      pay_month TEXT NOT NULL,
      gross_pay REAL NOT NULL,
      net_pay REAL NOT NULL
    );
    CREATE TABLE leave_records (
      leave_id INTEGER PRIMARY KEY,
      employee_id TEXT NOT NULL,
      leave_type TEXT NOT NULL,
      start_date TEXT NOT NULL,
      end_date TEXT NOT NULL,
      status TEXT NOT NULL
    );
  `);

  const baseByRole: Record<string, number> = {
    Captain: 18500,
    'First Officer': 11200,
    Purser: 6400,
    'Flight Attendant': 4800,
  };
  const payroll = db.prepare(
    'INSERT INTO payroll_records (employee_id, pay_month, gross_pay, net_pay) VALUES (?, ?, ?, ?)'
  );
  const leave = db.prepare(
    'INSERT INTO leave_records (employee_id, leave_type, start_date, end_date, status) VALUES (?, ?, ?, ?, ?)'
  );

  db.transaction(() => {
    for (let i = 0; i < CREW_COUNT; i++) {
      const base = baseByRole[pick(ROLES, i)] ?? 5000;
      for (let month = 1; month <= 6; month++) {
        const gross = base + ((i * month) % 9) * 150;
        payroll.run(employeeId(i), `2024-${String(month).padStart(2, '0')}`, gross, Math.round(gross * 0.72 * 100) / 100);
      }
      if (i % 2 === 0) {
        const start = 30 + ((i * 11) % 250);
        leave.run(employeeId(i), pick(['Annual', 'Sick', 'Training'], i), isoDate(2024, start), isoDate(2024, start + 4), pick(['Approved', 'Pending', 'Rejected'], i));
      }
    }
  })();
}

const SEEDERS: Record<string, (db: Database.Database) => void> = {
  crew_management: seedCrewManagement,
  flight_operations: seedFlightOperations,
  hr_payroll: seedHrPayroll,
};

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<void> {
  const config = await loadConfig();
  const { directory, attachments } = config.databases;
  fs.mkdirSync(directory, { recursive: true });

  for (const attachment of attachments) {
    const seed = SEEDERS[attachment.alias];
    if (seed === undefined) {
      logger.warn('No sample data for database alias; skipping', { alias: attachment.alias });
      continue;
    }

    const file = path.isAbsolute(attachment.file) ? attachment.file : path.join(directory, attachment.file);
    fs.rmSync(file, { force: true });

    const db = new Database(file);
    try {
      seed(db);
    } finally {
      db.close();
    }
    logger.info('Seeded database', { alias: attachment.alias, file });
  }
}

main().catch((error: unknown) => {
  logger.error('Seeding failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
