import pretty from 'pino-pretty';

const development = (opts: pretty.PrettyOptions) =>
  pretty({
    ...opts,
    translateTime: 'SYS:yyyy-mm-dd HH:MM:ss.l',
    ignore: 'hostname,pid,req.headers,res.headers',
    messageFormat: '{if caller}[{caller}] {end}{msg}',
    customPrettifiers: {
      caller: (caller, _key, _log, { colors }) =>
        `${colors.bold(colors.yellowBright(String(caller)))}`,
    },
  });

export default development;
