/**
 * Text menu that drives a {@link Session}: one numbered action per line,
 * prompts for the action's inputs, and a result or error line after each.
 *
 * @module menu
 */

import type { Logger } from './logger.js'
import type { Session } from './session.js'
import { describeError } from './types/common.js'

/**
 * Line-oriented terminal I/O. `ask` resolves `null` once input has ended.
 */
export type Prompter = {
  ask: (question: string) => Promise<string | null>
  print: (line: string) => void
}

type Action = {
  key: string
  label: string
  run: (ctx: MenuContext) => Promise<void>
}

type MenuContext = {
  session: Session
  io: Prompter
  logger: Logger
}

/** Thrown inside an action when input ends mid-prompt. */
class InputClosed extends Error {
  constructor() {
    super('input closed')
    this.name = 'InputClosed'
  }
}

async function ask(io: Prompter, question: string): Promise<string> {
  const answer = await io.ask(question)
  if (answer === null) throw new InputClosed()
  return answer.trim()
}

/**
 * Numbered choice. An empty answer returns `null`; anything out of range asks again.
 */
async function select(io: Prompter, question: string, choices: readonly string[]): Promise<string | null> {
  io.print(question)
  choices.forEach((choice, index) => io.print(`  ${index + 1}. ${choice}`))

  for (;;) {
    const answer = await ask(io, 'Enter number (blank to cancel): ')
    if (answer === '') return null
    const index = Number.parseInt(answer, 10) - 1
    if (Number.isInteger(index) && index >= 0 && index < choices.length) {
      return choices[index]
    }
    io.print('Invalid selection')
  }
}

function progressLine(fraction: number): string {
  const width = 20
  const filled = Math.round(fraction * width)
  return `[${'#'.repeat(filled)}${'.'.repeat(width - filled)}] ${Math.round(fraction * 100)}%`
}

const NO_COLUMN = '(not mapped)'

const actions: Action[] = [
  {
    key: '1',
    label: 'Select post type',
    async run({ session, io }) {
      if (session.postTypeKeys.length === 0) await session.loadPostTypes()
      if (session.postTypeKeys.length === 0) {
        io.print('No post types available. Check the connection and refresh.')
        return
      }
      const key = await select(io, 'Select post type:', session.postTypeKeys)
      if (key === null) return
      const fields = await session.selectPostType(key)
      io.print(`${key}: ${fields.length} fields (${fields.join(', ')})`)
    },
  },
  {
    key: '2',
    label: 'Load CSV file',
    async run({ session, io }) {
      const path = await ask(io, 'CSV file path: ')
      if (path === '') return
      const dataset = await session.useCsv(path)
      io.print(`Columns: ${dataset.columns.join(', ')}`)
    },
  },
  {
    key: '3',
    label: 'Load database table',
    async run({ session, io }) {
      const file = await ask(io, 'SQLite database path: ')
      if (file === '') return
      const tables = session.openDatabase(file)
      if (tables.length === 0) {
        io.print('The database has no tables.')
        return
      }
      const table = await select(io, 'Select table:', tables)
      if (table === null) return
      const dataset = session.useTable(table)
      io.print(`Columns: ${dataset.columns.join(', ')}`)
    },
  },
  {
    key: '4',
    label: 'Map fields',
    async run({ session, io }) {
      if (session.fields.length === 0 || session.columns.length === 0) {
        io.print('Select a post type and load data first.')
        return
      }
      const choices = [NO_COLUMN, ...session.columns]
      for (const field of session.fields) {
        const mapping = session.mapping
        const current = Object.hasOwn(mapping, field) ? mapping[field] : NO_COLUMN
        const column = await select(io, `Map '${field}' to (currently ${current}):`, choices)
        if (column === null) continue
        session.setMapping(field, column === NO_COLUMN ? null : column)
      }
      io.print(JSON.stringify(session.mapping, null, 2))
    },
  },
  {
    key: '5',
    label: 'Suggest mapping from column names',
    async run({ session, io }) {
      const added = session.suggestMapping()
      const entries = Object.entries(added)
      io.print(entries.length === 0 ? 'No matching column names.' : entries.map(([f, c]) => `${f} <- ${c}`).join('\n'))
    },
  },
  {
    key: '6',
    label: 'Preview mapping',
    async run({ session, io }) {
      io.print('Field Mapping:')
      io.print(JSON.stringify(session.mapping, null, 2))
      io.print('First payloads:')
      io.print(JSON.stringify(session.preview(), null, 2))
    },
  },
  {
    key: '7',
    label: 'Save mapping',
    async run({ session }) {
      await session.saveMapping()
    },
  },
  {
    key: '8',
    label: 'Load mapping',
    async run({ session, io }) {
      if (await session.loadMapping()) {
        io.print(JSON.stringify(session.mapping, null, 2))
      }
    },
  },
  {
    key: '9',
    label: 'Upload',
    async run({ session, io }) {
      const rows = session.dataset?.rows.length ?? 0
      const target = session.selectedPostType?.rest_base ?? '?'
      const answer = await ask(io, `Create ${rows} items in ${target}? [y/N] `)
      if (answer.toLowerCase() !== 'y' && answer.toLowerCase() !== 'yes') return
      const result = await session.upload((fraction) => io.print(progressLine(fraction)))
      io.print(`Succeeded: ${result.succeeded}, Failed: ${result.failed}`)
    },
  },
  {
    key: 't',
    label: 'Test connection',
    async run({ session }) {
      await session.testConnection()
    },
  },
  {
    key: 'r',
    label: 'Refresh post types',
    async run({ session, io }) {
      const types = await session.refreshPostTypes()
      io.print(`${Object.keys(types).length} post types`)
    },
  },
]

/**
 * Show the menu until the operator quits or input ends. An action's error is
 * logged and the menu is shown again.
 */
export async function runMenu(session: Session, io: Prompter, logger: Logger): Promise<void> {
  const context: MenuContext = { session, io, logger }
  await session.loadPostTypes()

  for (;;) {
    io.print('')
    for (const action of actions) io.print(`  ${action.key}. ${action.label}`)
    io.print('  q. Quit')

    const answer = await io.ask('> ')
    if (answer === null) return
    const choice = answer.trim().toLowerCase()
    if (choice === 'q') return

    const action = actions.find((candidate) => candidate.key === choice)
    if (action === undefined) {
      io.print('Unknown action')
      continue
    }

    try {
      await action.run(context)
    } catch (err) {
      if (err instanceof InputClosed) return
      logger.error(describeError(err))
    }
  }
}
