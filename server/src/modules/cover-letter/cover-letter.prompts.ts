import type { ParsedCoverLetterRequest } from '@shared/types'

export const COVER_LETTER_SYSTEM_PROMPT =
  'You are a professional career assistant. Craft tailored, concise, compelling ' +
  'cover letters with a confident, friendly tone. Keep to ~250-350 words.'

export function buildCoverLetterPrompt(request: ParsedCoverLetterRequest): string {
  return [
    `Candidate: ${request.user_name || 'The candidate'}`,
    `Target Role: ${request.job_title} at ${request.company_name}.`,
    'Job Description:',
    request.job_description,
    '',
    'Write a cover letter that highlights relevant skills and impact. Use a clean structure: ' +
      'intro, two short body paragraphs (skills + achievements), closing with a call to action.'
  ].join('\n')
}
