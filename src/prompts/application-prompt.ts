/**
 * Prompts for the application materials: cover letter, resume bullets and learning plan.
 */
export const APPLICATION_PROMPTS = {
  /* Prompt to write a tailored cover letter. */
  COVER_LETTER: `
    You are a professional cover letter writer.

    **Resume:**
    {resume}

    **Job Description:**
    {jobDescription}

    **Company:** {companyName}

    Write a tailored cover letter of 250-300 words that:
    - highlights the most relevant experience from the resume
    - addresses the key requirements of the job description
    - shows genuine interest in the role and the company

    Return only the letter, in plain text.
  `,

  /* Prompt to rewrite resume bullets toward the job description. */
  OPTIMIZE_BULLETS: `
    You are a resume optimization expert.

    **Current Resume:**
    {resume}

    **Target Job Description:**
    {jobDescription}

    Write 5-7 improved resume bullet points that start with an action verb,
    quantify achievements where the resume supports it, follow the STAR method
    and align with the job requirements.

    Start each bullet with "•". Plain text only.
  `,

  /* Prompt to build a learning plan for the missing skills. */
  LEARNING_PLAN: `
    You are a career development coach creating a skill improvement roadmap.

    Skills to acquire: {missingSkills}
    Current skills: {matchedSkills}

    Create a learning plan that covers:
    1. Priority skills to learn first, with the reason
    2. Learning resources: courses, books, documentation, certifications
    3. A realistic 3-6 month timeline
    4. Practice projects for each priority skill
    5. Milestones to track progress

    Use numbered sections and "•" bullets. Plain text only, no markdown.
  `,
} as const;
