/** Everything the runner needs to execute one solve. */
export interface ProcessInvocation {
  binaryPath: string;
  args: string[];
  /** Command file name, written inside the run's working directory. */
  inputFile: string;
  input: string;
  /** Result file the binary dumps into the working directory, if any. */
  outputFile?: string;
  /** Canonical descriptor of the solved situation, for diagnostics. */
  descriptor?: string;
}
