/**
 * Prompts for score-dependent resume improvement suggestions.
 * STANDARD is used for a decent match, DEEP for a weak one.
 */
export const IMPROVEMENT_PROMPTS = {
  STANDARD: `
    You are a resume improvement expert.

    **Current Resume:**
    {resume}

    **Target Job Description:**
    {jobDescription}

    Matched Skills: {matchedSkills}
    Missing Skills: {missingSkills}

    The resume already matches most requirements. Give 2-3 short, actionable suggestions
    (1-2 sentences each) with the most impact. When a suggestion concerns a missing skill,
    put that skill in "skill", otherwise leave "skill" empty.

    Use plain text only, no markdown.
  `,

  DEEP: `
    You are a senior resume coach working with a candidate whose resume is a weak match.

    **Current Resume:**
    {resume}

    **Target Job Description:**
    {jobDescription}

    Matched Skills: {matchedSkills}
    Missing Skills: {missingSkills}

    Give 4-7 detailed suggestions (2-4 sentences each) to close the gap. Cover:
    - how to surface each missing skill the candidate may already have
    - which experience to reframe toward the job requirements
    - structure and keyword changes that help an ATS parse the resume
    Key every suggestion about a missing skill to that skill in "skill".
    At least one suggestion must address a missing skill.

    Use plain text only, no markdown.
  `,
} as const;
