// Column names follow the ITAC database export, not camelCase

// SQLite stores these code columns with whatever affinity the import produced,
// so codes may come back as TEXT or as numbers.
export type CodeValue = string | number;

// Assessments Table (one row per plant visit)
export interface Assessments {
  id: CodeValue;
  center: string | null;
  fiscal_year: number | null;
  sic: CodeValue | null;
  naics: CodeValue | null;
  state: string | null;
  products: string | null;
}

// Recommendations Table (one row per recommendation made during an assessment)
export interface Recommendations {
  super_id: string;
  assessment_id: CodeValue | null;
  arc: CodeValue | null;
  imp_status: string | null;
  imp_cost: number | null;
  fiscal_year: number | null;
  payback: number | null;
  total_savings: number | null;
  p_conserved_mmbtu: number | null;
  total_energy_saved: number | null;
}

// Database Interface
export interface ItacDatabase {
  assessments: Assessments;
  recommendations: Recommendations;
}

// Tables the service reads; readiness fails while any is missing
export const ITAC_TABLES = [
  'recommendations',
  'assessments',
] as const satisfies readonly (keyof ItacDatabase)[];
