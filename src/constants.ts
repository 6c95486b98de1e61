/**
 * Library Constants
 *
 * Defaults shared by the transports and the instrument session.
 */

// ============== Timeouts ==============

/** Default per-operation timeout in ms (connect, write, read) */
export const DEFAULT_TIMEOUT = 5000;

// ============== Framing ==============

/** Line terminator appended on send and expected on receive */
export const DEFAULT_TERMINATOR = '\n';

/** Text encoding of command and response lines */
export const DEFAULT_ENCODING: BufferEncoding = 'ascii';

// ============== TCP ==============

/** Default host */
export const DEFAULT_HOST = 'localhost';

/** Default raw-socket port (LXI instruments commonly also listen on 5025) */
export const DEFAULT_TCP_PORT = 5555;

// ============== Serial ==============

/** Default serial baud rate */
export const DEFAULT_BAUD_RATE = 115200;

// ============== IEEE 488.2 common commands ==============

export const IDN_QUERY = '*IDN?';
export const RESET_COMMAND = '*RST';
export const CLEAR_STATUS_COMMAND = '*CLS';
export const WAIT_COMMAND = '*WAI';
export const OPC_QUERY = '*OPC?';
export const SAVE_COMMAND = '*SAV';
export const RECALL_COMMAND = '*RCL';
export const SELF_TEST_QUERY = '*TST?';

/** SCPI system error queue query */
export const ERROR_QUERY = ':SYST:ERR?';

/** Upper bound on error-queue reads in a single drain */
export const DEFAULT_MAX_ERROR_DRAIN = 32;
