/**
 * KEYS[1]          entry key
 * KEYS[2..t+1]     tag set keys
 * KEYS[t+2..t+g+1] generation keys of the guarded tags
 * ARGV[1]          value
 * ARGV[2]          ttl in ms, 0 for none
 * ARGV[3..g+2]     expected generation of each guarded tag
 *
 * Writes the entry and registers it in every tag set, unless a guarded tag
 * was invalidated since its generation was read. A tag set lives at least as
 * long as the longest-lived entry it references. Returns 1 when written.
 */
export const SET_TAGGED_SCRIPT = `
local ttl = tonumber(ARGV[2])
local guarded = #ARGV - 2
local tags = #KEYS - 1 - guarded

for i = 1, guarded do
  local current = redis.call("GET", KEYS[tags + 1 + i]) or "0"
  if current ~= ARGV[2 + i] then
    return 0
  end
end

if ttl > 0 then
  redis.call("SET", KEYS[1], ARGV[1], "PX", ttl)
else
  redis.call("SET", KEYS[1], ARGV[1])
end

for i = 2, tags + 1 do
  local existed = redis.call("EXISTS", KEYS[i])
  redis.call("SADD", KEYS[i], KEYS[1])

  if ttl > 0 then
    local current = redis.call("PTTL", KEYS[i])
    if existed == 0 or (current >= 0 and current < ttl) then
      redis.call("PEXPIRE", KEYS[i], ttl)
    end
  else
    redis.call("PERSIST", KEYS[i])
  end
end

return 1
`

/**
 * KEYS[1..n]    tag set keys
 * KEYS[n+1..2n] generation keys, in the same order
 * ARGV[1]       delete batch size
 *
 * Deletes every entry referenced by the tag sets, then the sets themselves,
 * and bumps each tag's generation. Returns the number of entries removed.
 */
export const INVALIDATE_TAGS_SCRIPT = `
local batch = tonumber(ARGV[1])
local tags = #KEYS / 2
local removed = 0

for i = 1, tags do
  local members = redis.call("SMEMBERS", KEYS[i])

  for first = 1, #members, batch do
    local last = math.min(first + batch - 1, #members)
    removed = removed + redis.call("DEL", unpack(members, first, last))
  end

  redis.call("DEL", KEYS[i])
  redis.call("INCR", KEYS[tags + i])
end

return removed
`
