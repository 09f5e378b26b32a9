import { z } from "zod";
import medicinesSeed from "../data/medicines.json";
import facetsSeed from "../data/facets.json";
import type { MedicineEntry, MedicineRecord } from "./types";

const medicineRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  group: z.string().optional(),
  company: z.string().optional(),
  description: z.string().optional(),
});

const facetsSchema = z.object({
  groups: z.array(z.string()),
  companies: z.array(z.string()),
});

export type Facets = z.infer<typeof facetsSchema>;

export type Catalog = {
  readonly records: readonly MedicineRecord[];
  searchByName: (query: string) => MedicineRecord[];
  filterByGroup: (group: string) => MedicineRecord[];
  filterByCompany: (company: string) => MedicineRecord[];
  findById: (id: string) => MedicineRecord | undefined;
  distinctGroups: () => string[];
  distinctCompanies: () => string[];
};

export const toEntry = ({ id, name }: MedicineRecord): MedicineEntry => ({ id, name });

export const searchByName = (records: readonly MedicineRecord[], query: string): MedicineRecord[] => {
  if (!query) return [...records];
  const needle = query.toLowerCase();
  return records.filter((record) => record.name.toLowerCase().includes(needle));
};

export const filterByGroup = (records: readonly MedicineRecord[], group: string): MedicineRecord[] =>
  records.filter((record) => record.group === group);

export const filterByCompany = (records: readonly MedicineRecord[], company: string): MedicineRecord[] =>
  records.filter((record) => record.company === company);

/**
 * Builds a read-only catalog. Records are copied and frozen, so callers
 * cannot alter the catalog through the array they passed in.
 */
export const createCatalog = (records: readonly MedicineRecord[], facets: Facets): Catalog => {
  const seen = new Set<string>();
  for (const record of records) {
    if (seen.has(record.id)) {
      throw new Error(`Duplicate medicine id in catalog: ${record.id}`);
    }
    seen.add(record.id);
  }

  const frozen: readonly MedicineRecord[] = Object.freeze(records.map((record) => Object.freeze({ ...record })));
  const groups = Object.freeze([...facets.groups]);
  const companies = Object.freeze([...facets.companies]);

  return Object.freeze({
    records: frozen,
    searchByName: (query: string) => searchByName(frozen, query),
    filterByGroup: (group: string) => filterByGroup(frozen, group),
    filterByCompany: (company: string) => filterByCompany(frozen, company),
    findById: (id: string) => frozen.find((record) => record.id === id),
    distinctGroups: () => [...groups],
    distinctCompanies: () => [...companies],
  });
};

let catalog: Catalog | null = null;

export const getCatalog = (): Catalog => {
  if (catalog) return catalog;
  const records = z.array(medicineRecordSchema).parse(medicinesSeed);
  const facets = facetsSchema.parse(facetsSeed);
  catalog = createCatalog(records, facets);
  return catalog;
};
