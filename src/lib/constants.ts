export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;
export const INDENT = ' '.repeat(4);
