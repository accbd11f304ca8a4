/** Options declared on the root program and visible to every command. */
export type GlobalOptions = {
  config?: string;
  verbose?: boolean;
};
