/**
 * Prompt for the ATS match analysis.
 * The model extracts skills from both documents, matches them and scores the match.
 */
export const ATS_PROMPTS = {
  ANALYZE_MATCH: `
    You are an applicant tracking system (ATS) analyst.

    Compare the candidate's resume with the job description.

    1. List the technical skills and tools the job description asks for, both must-have and nice-to-have.
    2. For each of them, decide whether the resume explicitly shows it in the skills,
       projects or experience sections. Ignore the profile summary and objective.
       Do NOT infer skills that are not stated.
    3. matchedSkills: required skills the resume shows.
       missingSkills: required skills the resume does not show.
    4. score: round(matched / required * 100), an integer between 0 and 100.

    **Resume:**
    {resume}

    **Job Description:**
    {jobDescription}

    Return ONLY valid JSON with no additional text or formatting.
  `,
} as const;
