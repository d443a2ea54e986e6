export interface CoverLetterResponse {
  text: string
}
