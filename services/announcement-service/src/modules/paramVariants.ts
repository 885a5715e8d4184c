import { ParamVariant } from "../interfaces/announcement";

export interface VariantInput {
  segment?: string;
  submissionType: string;
  /** DD/MM/YYYY */
  fromDate: string;
  /** DD/MM/YYYY */
  toDate: string;
  page: number;
  search?: string;
  category?: string;
  subcategory?: string;
}

/**
 * Guesses at the upstream's field naming, in the order they should be
 * tried. They differ only in which field carries the submission type.
 */
export function buildParamVariants(input: VariantInput): ParamVariant[] {
  const base: ParamVariant = {
    strCat: input.category || "-1",
    strSubCat: input.subcategory || "",
    strType: input.segment || "C",
    strFromDate: input.fromDate,
    strToDate: input.toDate,
    strSearch: input.search || "",
    strScrip: "",
    pageno: String(input.page),
  };

  return [
    { ...base, strIsXBRL: input.submissionType },
    { ...base, strAnnSubmitType: input.submissionType },
    // Some deployments honor strPrevDate; harmless if empty
    { ...base, strIsXBRL: input.submissionType, strPrevDate: "" },
  ];
}
