/**
 * Prompts for the self-review pass: critique the draft package, then apply the critique.
 */
export const REVIEW_PROMPTS = {
  SELF_REVIEW: `
    You are a senior career advisor reviewing a job application package.

    **Original Resume:**
    {resume}

    **Job Description:**
    {jobDescription}

    **Generated Package:**
    {package}

    Review the package critically and give specific suggestions on:
    1. Cover letter: tone, personalization, impact, alignment with the job
    2. Resume bullets: clarity, quantification, action verbs, relevance
    3. Interview questions: coverage, difficulty, relevance
    4. Overall coherence across the sections

    Be constructive but name real weaknesses. Plain text with "•" bullets.
  `,

  REVISE: `
    You are improving a cover letter and resume bullets based on expert feedback.

    **Cover Letter:**
    {coverLetter}

    **Resume Bullets:**
    {bullets}

    **Review Feedback:**
    {critique}

    **Original Resume:**
    {resume}

    **Job Description:**
    {jobDescription}

    Rewrite both to address the feedback. Keep the cover letter at 250-300 words and
    start each bullet with "•". In changeSummary, list the main changes you made in
    2-5 short lines. Plain text only inside every field.

    Return ONLY valid JSON with no additional text or formatting.
  `,
} as const;
