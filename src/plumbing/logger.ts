import info from '../../package.json' with { type: 'json' }

const { name, version } = info

type LogFields = { [key: string]: string | number | boolean | object }

export const log = (message: string | ({ message: string } & LogFields)) => {
  const fields: { message: string } & LogFields =
    typeof message === 'string' ? { message } : message
  console.log({
    ...fields,
    app: name,
    version,
  })
}
