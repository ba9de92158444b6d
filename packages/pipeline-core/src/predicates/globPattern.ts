const compiledPatterns = new Map<string, RegExp>()

/**
 * Matches a value against a glob pattern.
 *
 * `*` matches within one `/`-separated segment, `**` matches across segments
 * and `?` matches a single non-separator character.
 *
 * @param pattern Glob pattern, for example `refs/tags/*`.
 * @param value Value to test.
 * @returns True when the whole value matches.
 */
export const matchesGlob = (pattern: string, value: string): boolean => {
  let regex = compiledPatterns.get(pattern)
  if (!regex) {
    regex = globToRegExp(pattern)
    compiledPatterns.set(pattern, regex)
  }

  return regex.test(value)
}

/**
 * Compiles a glob pattern into an anchored regular expression.
 *
 * @param pattern Glob pattern.
 * @returns Regular expression matching the whole input.
 */
export const globToRegExp = (pattern: string): RegExp => {
  let regex = '^'

  for (let index = 0; index < pattern.length; index += 1) {
    const character = pattern[index]
    if (!character) {
      continue
    }

    if (character === '*') {
      const nextCharacter = pattern[index + 1]
      const afterNextCharacter = pattern[index + 2]
      if (nextCharacter === '*' && afterNextCharacter === '/') {
        regex += '(?:.*/)?'
        index += 2
        continue
      }

      if (nextCharacter === '*') {
        regex += '.*'
        index += 1
        continue
      }

      regex += '[^/]*'
      continue
    }

    if (character === '?') {
      regex += '[^/]'
      continue
    }

    regex += escapeRegExpCharacter(character)
  }

  regex += '$'
  return new RegExp(regex)
}

const escapeRegExpCharacter = (character: string): string => {
  return /[\\^$.*+?()[\]{}|]/.test(character) ? `\\${character}` : character
}
