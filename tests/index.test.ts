import { describe, it, expect } from 'vitest'
import { RequestNotFoundError, clientFor, createMock, toXml } from '../src'

describe('package entry', () => {
  it('runs a scenario through the public API', async () => {
    const mock = createMock({ diagnostics: false })
    mock.define('author', (t) => t.uniquify('name'))
    mock.beginScenario()
    const author = mock.create('author')

    expect(toXml(mock.serialize(author))).toBe(
      '<?xml version="1.0" encoding="UTF-8"?>\n<author>\n  <id type="integer">1</id>\n  <name>author name 1</name>\n</author>\n',
    )
    expect(await clientFor(mock).get('authors', author.id)).toEqual({ id: 1, name: 'author name 1' })
    await expect(clientFor(mock).list('publishers')).rejects.toThrow(RequestNotFoundError)
  })
})
