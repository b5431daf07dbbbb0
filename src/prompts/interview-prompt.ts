/**
 * Prompts for interview preparation and role research.
 */
export const INTERVIEW_PROMPTS = {
  QUESTIONS: `
    You are an interview preparation coach.

    **Job Description:**
    {jobDescription}

    **Candidate Resume:**
    {resume}

    Write 8-10 likely interview questions for this role:
    - technical questions on the required skills
    - behavioral questions
    - questions about gaps or concerns in the resume
    - questions specific to the role and company

    Number the questions (1., 2., ...). Plain text only, no markdown.
  `,

  ROLE_RESEARCH: `
    You are a career research expert.

    **Job Description:**
    {jobDescription}

    **Company:** {companyName}

    Describe what this role usually expects:
    1. Common skills for the position
    2. Key day-to-day responsibilities
    3. Seniority indicators
    4. Industry trends affecting the role
    5. How performance is usually measured
    6. Typical career progression

    Use numbered sections and "•" bullets. Plain text only, no markdown.
  `,
} as const;
