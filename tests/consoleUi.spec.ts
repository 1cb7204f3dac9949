/**
 * ConsoleUi tests
 */

import { ConsoleUi } from '../src/ui/ConsoleUi'

describe('ConsoleUi', () => {
  it('writes messages to the output stream', () => {
    const out = { write: jest.fn() }
    const err = { write: jest.fn() }
    const ui = new ConsoleUi('upcloud', out, err)

    ui.say('Creating template for storage "disk-1"...')

    expect(out.write).toHaveBeenCalledWith('==> upcloud: Creating template for storage "disk-1"...\n')
    expect(err.write).not.toHaveBeenCalled()
  })

  it('writes errors to the error stream', () => {
    const out = { write: jest.fn() }
    const err = { write: jest.fn() }
    const ui = new ConsoleUi('upcloud', out, err)

    ui.error('delete of clone-1 failed')

    expect(err.write).toHaveBeenCalledWith('==> upcloud: delete of clone-1 failed\n')
    expect(out.write).not.toHaveBeenCalled()
  })
})
