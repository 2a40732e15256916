import { describe, expect, it } from 'vitest'
import { parseConfigText } from '../../lib/config.js'
import { sampleConfig } from '../config.js'

describe('sampleConfig', () => {
  it('parses back with only the detected values filled in', () => {
    expect(parseConfigText(sampleConfig({ owner: 'acme', repo: 'shop' }), '.octoebrc')).toEqual({
      repo: { OWNER: 'acme', REPO: 'shop' },
      bugtracker: { BASE_URL: 'https://example.atlassian.net' },
      slack: {},
      release: {},
    })
  })

  it('leaves the repository blank when no remote was found', () => {
    expect(parseConfigText(sampleConfig(null), '.octoebrc').repo).toEqual({})
  })
})
