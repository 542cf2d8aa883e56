import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { pinoFactory } from "./pino-harness"

describeLoggerContract(pinoFactory())
