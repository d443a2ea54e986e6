export * from "./common.schema"
export * from "./quiz.schema"
export * from "./resume.schema"
export * from "./cover-letter.schema"
export * from "./insights.schema"
