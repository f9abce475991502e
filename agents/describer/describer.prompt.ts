const DESCRIPTION_SECTIONS = [
  "Description",
  "How can reviewers verify the behavior?",
  "Screenshots or links that might help speed up the review",
  "Are you looking for feedback in a specific area?",
] as const;

const INSTRUCTIONS = [
  "We would like to create a Pull Request Description based on the git diff.",
  "We prefer concise descriptions, so please try to keep it short.",
  "Highlight the major changes and the improvements made.",
  "If there are any changes to package dependencies, mention them only if there are new dependencies or if any dependency version was updated,",
  "and remind the reader to reinstall dependencies after pulling the changes.",
  "Reply with Markdown format.",
  `Include these ${DESCRIPTION_SECTIONS.length} headers in the PR output using ## Markdown styling:`,
  `${DESCRIPTION_SECTIONS.join(", ")}.`,
].join(" ");

const buildDescriberPrompt = (diff: string) => `${INSTRUCTIONS}\n\n${diff}`;

export { DESCRIPTION_SECTIONS, INSTRUCTIONS, buildDescriberPrompt };
