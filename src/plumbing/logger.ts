import info from '../../package.json' with { type: 'json' }

const { name, version } = info

export type LogValue = string | number | boolean | null | undefined | object

export interface LogFields {
  message: string
  [key: string]: LogValue
}

export const log = (message: string | LogFields) => {
  const fields: LogFields =
    typeof message === 'string' ? { message } : { ...message }

  console.log({
    ...fields,
    app: name,
    version,
  })
}
