// ---------------------------------------------------------------------------
// Lambda entry point
//
// Wraps the Hono app with the AWS Lambda adapter. DATABASE_URL must point at
// the database (or its connection proxy) in the function's environment.
// ---------------------------------------------------------------------------

import { handle } from 'hono/aws-lambda'
import { app } from './app'

export const handler = handle(app)
