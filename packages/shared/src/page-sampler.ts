/**
 * Page Sampling for Long Documents
 *
 * Clinical documents front-load identifying data and back-load signatures, so
 * documents over the page budget are recognized from their first and last pages only.
 */

export interface PageSamplingPolicy {
  /** Documents with more pages than this are sampled */
  maxPages: number;
  /** Pages kept from the start of a sampled document */
  headerPages: number;
  /** Pages kept from the end of a sampled document */
  footerPages: number;
}

/**
 * Select the 1-based page numbers to recognize, in document order.
 */
export function selectPages(totalPages: number, policy: PageSamplingPolicy): number[] {
  const all = Array.from({ length: Math.max(0, totalPages) }, (_, i) => i + 1);

  const header = Math.max(0, policy.headerPages);
  const footer = Math.max(0, policy.footerPages);

  if (totalPages <= policy.maxPages || totalPages < header + footer) {
    return all;
  }

  return [...all.slice(0, header), ...all.slice(totalPages - footer)];
}

