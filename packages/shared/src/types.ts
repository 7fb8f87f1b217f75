/**
 * Shared TypeScript Types
 *
 * Types for the lab report extraction pipeline, matching the JSON schemas in
 * packages/shared/contracts/
 */

// ============================================================================
// Report Types
// ============================================================================

export const REPORT_TYPES = ['IKC', 'AKH'] as const;

export type ReportType = (typeof REPORT_TYPES)[number];

/** Target for reports whose panel composition is not known in advance. */
export const GENERIC_REPORT = 'GENERIC';

export type ExtractionTarget = ReportType | typeof GENERIC_REPORT;

export type Gender = 'M' | 'W';

// ============================================================================
// Analytes
// ============================================================================

/**
 * A single lab measurement. `result` and `reference` stay as printed:
 * reports mix numeric values, thresholds and asterisk markers.
 */
export interface Analyte {
  caption: string;
  result: string;
  unit: string;
  reference: string;
  comments?: string | null;
  out_of_range?: boolean | null;
}

/** Analyte entry of the generic sections list; the name lives in `analyte`. */
export interface SectionEntry {
  analyte: string;
  result: string;
  unit: string;
  reference: string;
  comments?: string | null;
  out_of_range?: boolean | null;
}

export interface Section {
  section_name: string;
  data: SectionEntry[];
}

// ============================================================================
// Report Header
// ============================================================================

export interface ReportHeader {
  report_id: string;
  project: string;
  patient_id: string;
  gender?: Gender | null;
  birth_year?: string | null;
  daily_id: string | null;
  date: string | null;
  time: string | null;
}

// ============================================================================
// IKC (clinical chemistry panel)
// ============================================================================

export interface ElectrolyteAndWaterBalance {
  caption: string;
  sodium: Analyte;
  potassium: Analyte;
  total_calcium: Analyte;
  albumin_corrected_calcium: Analyte;
  phosphate: Analyte;
}

export interface Kidney {
  caption: string;
  urea: Analyte;
  creatinine: Analyte;
  egfr_crea_ckd_epi_2009: Analyte;
  uric_acid: Analyte;
}

export interface AminoAcidBilirubinAndHemeMetabolism {
  caption: string;
  bilirubin_total: Analyte;
}

export interface Proteins {
  caption: string;
  protein: Analyte;
  albumin: Analyte;
}

export interface Enzymes {
  caption: string;
  ast_got: Analyte;
  ggt: Analyte;
  alkaline_phosphatase: Analyte;
}

export interface Inflammation {
  caption: string;
  crp: Analyte;
}

export interface HeartAndMuscle {
  caption: string;
  ck_total: Analyte;
  troponin_t_hs: Analyte;
  nt_pro_bnp: Analyte;
}

export interface DiabetesAndEnergyMetabolism {
  caption: string;
  glucose_hep_plasma: Analyte;
  hba1c_ngsp: Analyte;
  hba1c_ifcc: Analyte;
}

export interface LipidAndArteriosclerosis {
  caption: string;
  total_cholesterol: Analyte;
  hdl_cholesterol: Analyte;
  non_hdl_cholesterol: Analyte;
  ldl_cholesterol_sampson: Analyte;
  triglycerides: Analyte;
  lipoprotein_a: Analyte;
  apolipoprotein_a1: Analyte;
  apolipoprotein_b: Analyte;
}

export interface IronMetabolism {
  caption: string;
  iron: Analyte;
  ferritin_eclia: Analyte;
  ferritin_risk_eclia: Analyte;
  transferrin: Analyte;
}

export interface Vitamins {
  caption: string;
  folic_acid: Analyte;
  vitamin_b12: Analyte;
  hydroxyvitamin_d: Analyte;
}

export interface ThyroidFunction {
  caption: string;
  tsh_basal_ft4: Analyte;
  ft3_free: Analyte;
  ft4_free: Analyte;
}

export interface SexualHormones {
  caption: string;
  testosterone: Analyte;
  estradiol: Analyte;
  // Female-specific, absent on most male reports
  lh?: Analyte | null;
  fsh?: Analyte | null;
  progesterone?: Analyte | null;
}

export interface IkcLabResult {
  electrolyte_and_water_balance: ElectrolyteAndWaterBalance;
  kidney: Kidney;
  amino_acid_bilirubin_and_heme_metabolism: AminoAcidBilirubinAndHemeMetabolism;
  proteins: Proteins;
  enzymes: Enzymes;
  inflammation: Inflammation;
  heart_and_muscle: HeartAndMuscle;
  diabetes_and_energy_metabolism: DiabetesAndEnergyMetabolism;
  lipid_and_arteriosclerosis: LipidAndArteriosclerosis;
  iron_metabolism: IronMetabolism;
  vitamins: Vitamins;
  thyroid_function: ThyroidFunction;
  sexual_hormones: SexualHormones;
}

export interface IkcReport extends ReportHeader {
  lab_result: IkcLabResult;
}

// ============================================================================
// AKH (hematology panel)
// ============================================================================

export interface BloodStatus {
  caption: string;
  hemoglobin: Analyte;
  hematocrit: Analyte;
  erythrocytes: Analyte;
  mcv: Analyte;
  mch: Analyte;
  mchc: Analyte;
  rdw: Analyte;
  platelets: Analyte;
  leukocytes: Analyte;
}

export interface BloodCountAbsolute {
  caption: string;
  neutrophils: Analyte;
  monocytes: Analyte;
  eosinophils: Analyte;
  basophils: Analyte;
  lymphocytes: Analyte;
  immature_granulocytes: Analyte;
  nrbc_abs: Analyte;
}

export interface BloodCountRelative {
  caption: string;
  neutrophils: Analyte;
  monocytes: Analyte;
  eosinophils: Analyte;
  basophils: Analyte;
  lymphocytes: Analyte;
  immature_granulocytes: Analyte;
  nrbc: Analyte;
}

export interface HematologicalExaminations {
  caption: string;
  blood_status: BloodStatus;
  blood_count_absolute: BloodCountAbsolute;
  blood_count_relative: BloodCountRelative;
}

export interface CoagulationFactors {
  caption: string;
  fibrinogen: Analyte;
}

export interface HemostasisExaminations {
  caption: string;
  coagulation_factors: CoagulationFactors;
}

export interface AkhLabResult {
  hematological_examinations: HematologicalExaminations;
  hemostasis_examinations: HemostasisExaminations;
}

export interface AkhReport extends ReportHeader {
  lab_result: AkhLabResult;
}

// ============================================================================
// Generic
// ============================================================================

export interface GenericReport extends ReportHeader {
  sections: Section[];
}

/**
 * Record shape produced for each extraction target.
 */
export interface ReportByTarget {
  IKC: IkcReport;
  AKH: AkhReport;
  GENERIC: GenericReport;
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Sampling parameters sent with each structured-generation request.
 * top_k, repetition_penalty, min_p and top_a are extensions understood by
 * OpenAI-compatible gateways (OpenRouter, vLLM, llama.cpp).
 */
export interface GenerationSettings {
  temperature: number;
  top_p: number;
  top_k: number;
  frequency_penalty: number;
  presence_penalty: number;
  repetition_penalty: number;
  min_p: number;
  top_a: number;
  max_tokens: number;
}

/**
 * Connection to the OpenAI-compatible model endpoint
 */
export interface ModelConnection {
  modelName: string;
  baseUrl: string;
  apiKey?: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}
