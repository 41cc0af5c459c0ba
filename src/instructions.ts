export const INSTRUCTIONS = `
# Notes

You have access to a local-first note store via MCP tools. Notes live in a
local database and are mirrored to the user's notes service ("keep") and
optionally to one backup provider ("gdrive" or "github").

- **Read:** \`list_notes\`, \`search_notes\`, \`get_note\`
- **Write:** \`save_note\`, \`delete_note\`, \`restore_note\`, \`manage_labels\`
- **Sync:** \`connect_provider\`, \`disconnect_provider\`, \`sync_notes\`, \`sync_status\`, \`sync_log\`
- **Links:** \`unlink_note\`, \`resolve_conflict\`
- **Transfer:** \`export_notes\`, \`import_notes\`

## Sync behaviour

- Local edits are marked pending and sent on the next sync cycle.
- A note changed both locally and remotely since the last sync becomes a
  conflict. Neither side is overwritten until \`resolve_conflict\` picks one.
- Trashed notes (\`delete_note\` without \`permanent\`) are not pushed;
  remote copies stay until the note is restored. Permanent deletion only
  removes the local copy.
`;
