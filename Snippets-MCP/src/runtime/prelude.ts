/**
 * Script evaluated inside the snippet context before the snippet itself.
 *
 * Reads the payload from `__snippetInit` (a JSON string, parsed inside the
 * context so every object belongs to the snippet's realm) and defines:
 *
 *   $                 fields, `$.commands` by name, `$.cmd(name, ...args)`
 *   <field>           each wire field as a global (`user`, `message`, ...)
 *   $<name>           a callable per catalog entry; `a/b-c` is `$a.b_c`
 *
 * An entry that is also a parent (`a` next to `a/b`) is callable and still
 * carries its children.
 */
export const PRELUDE = String.raw`
(() => {
  const init = JSON.parse(globalThis.__snippetInit);
  delete globalThis.__snippetInit;

  const runEntry = (entry, args) => {
    if (entry.run && entry.run.trim()) {
      const body = new Function('args', entry.run);
      return body.call({ name: entry.name, content: entry.content, code: entry.run }, args);
    }
    console.log(entry.content);
    return undefined;
  };

  const commands = {};
  for (const entry of init.commands) {
    commands[entry.name] = {
      name: entry.name,
      content: entry.content,
      code: entry.run || null,
      run: (...args) => runEntry(entry, args),
    };
  }

  const $ = {
    commands,
    cmd(name, ...args) {
      if (!Object.prototype.hasOwnProperty.call(commands, name)) {
        throw new Error('Command not found: ' + name);
      }
      return commands[name].run(...args);
    },
  };
  for (const key of Object.keys(init.fields)) {
    $[key] = init.fields[key];
    globalThis[key] = init.fields[key];
  }
  globalThis.$ = $;

  const callable = (entry) => {
    const fn = (...args) => runEntry(entry, args);
    fn._name = entry.name;
    fn._content = entry.content;
    fn._code = entry.run || null;
    return fn;
  };

  const tree = {};
  for (const entry of init.commands) {
    const parts = entry.name.split('/').map((part) => part.replace(/-/g, '_'));
    const leaf = parts.pop();
    let node = tree;
    for (const part of parts) {
      if (node[part] === undefined) node[part] = {};
      node = node[part];
    }
    const fn = callable(entry);
    if (node[leaf] !== undefined) Object.assign(fn, node[leaf]);
    node[leaf] = fn;
  }
  for (const key of Object.keys(tree)) {
    globalThis['$' + key] = tree[key];
  }
})();
`;
