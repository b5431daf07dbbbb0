/**
 * Prompt for user-directed refinement of selected report sections.
 */
export const REFINEMENT_PROMPTS = {
  REFINE: `
    You are editing parts of a job application package for {companyName}.

    **Refinement focus:**
    {focus}

    **Additional instructions from the candidate:**
    {instructions}

    **Sections to rewrite:**
    {sections}

    **Rest of the package, for context only:**
    {context}

    Rewrite only the sections listed under "Sections to rewrite", following the focus.
    Keep facts consistent with the rest of the package and do not invent experience.
    Return one field per section id with the full rewritten text. Plain text only.

    Return ONLY valid JSON with no additional text or formatting.
  `,
} as const;
