/**
 * pushtalk - push-to-talk voice relay runtime
 *
 * Records while the button is held (or between two double taps), sends
 * the recording to an endpoint and plays back whatever comes back,
 * showing progress on an APA102 LED strip.
 */

import { App } from "./cli/app"

const app = new App()
const exitCode = await app.run(process.argv.slice(2))
process.exit(exitCode)
