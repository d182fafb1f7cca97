import type { NewUser } from "../types.js";

export function validatePhone(phone: string): void {
  if (!/^\+[1-9]\d{7,14}$/.test(phone)) {
    throw new Error(`Invalid E.164 phone number: ${phone}`);
  }
}

const IMPORT_FIELDS = ["phone", "clientCode", "companyId", "name", "email"] as const;

export function parseUserImport(data: unknown): NewUser[] {
  if (!Array.isArray(data)) {
    throw new Error("User import must be a JSON array");
  }
  const seenCodes = new Set<string>();
  const seenPhones = new Set<string>();
  return data.map((entry: unknown, index) => {
    if (typeof entry !== "object" || entry === null) {
      throw new Error(`User #${index + 1} is not an object`);
    }
    const fields = new Map(Object.entries(entry));
    const values: string[] = IMPORT_FIELDS.map((field) => {
      const value = fields.get(field);
      if (typeof value !== "string" || !value.trim()) {
        throw new Error(`User #${index + 1} is missing '${field}'`);
      }
      return value.trim();
    });
    const [phone, clientCode, companyId, name, email] = values;
    validatePhone(phone);
    if (seenCodes.has(clientCode)) {
      throw new Error(`User #${index + 1} repeats client code ${clientCode}`);
    }
    seenCodes.add(clientCode);
    if (seenPhones.has(phone)) {
      throw new Error(`User #${index + 1} repeats phone ${phone}`);
    }
    seenPhones.add(phone);
    return { phone, clientCode, companyId, name, email };
  });
}
