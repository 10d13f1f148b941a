import chalk from "chalk"
import ora, { type Ora } from "ora"

/**
 * Presenter for the interactive commands (config, check, usage errors).
 * Status goes to stderr with ora and chalk; results go to stdout.
 * The running device never prints through here, it only logs.
 */
export class Presenter {
  private spinner: Ora | null = null

  /**
   * Start a spinner with a message (writes to stderr)
   */
  startSpinner(message: string): void {
    this.spinner = ora({
      text: message,
      stream: process.stderr,
    }).start()
  }

  /**
   * Stop the spinner with a success message
   */
  spinnerSuccess(message: string): void {
    if (this.spinner) {
      this.spinner.succeed(message)
      this.spinner = null
    }
  }

  /**
   * Stop the spinner with a failure message
   */
  spinnerFail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message)
      this.spinner = null
    }
  }

  /**
   * Write info message to stderr
   */
  info(message: string): void {
    console.error(chalk.blue("ℹ"), message)
  }

  /**
   * Write success message to stderr
   */
  success(message: string): void {
    console.error(chalk.green("✓"), message)
  }

  /**
   * Write warning message to stderr
   */
  warn(message: string): void {
    console.error(chalk.yellow("⚠"), message)
  }

  /**
   * Write error message to stderr
   */
  error(message: string): void {
    console.error(chalk.red("✗"), message)
  }

  /**
   * Write one `key = value` line to stdout. Values that are not set in
   * the file are dimmed and carry their source.
   */
  setting(
    key: string,
    value: string,
    source: "file" | "default" | "unset",
  ): void {
    if (source === "file") {
      console.log(`${key} = ${value}`)
    } else if (source === "default") {
      console.log(`${key} = ${value} ${chalk.gray("(default)")}`)
    } else {
      console.log(`${key} = ${chalk.gray("(not set)")}`)
    }
  }

  /**
   * Write a plain result line to stdout (for piping)
   */
  output(text: string): void {
    console.log(text)
  }
}
