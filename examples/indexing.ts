import {
  IndexCatalog,
  TableSchema,
  TargetMode,
  isLocal,
  multipleColumns,
  parseTarget,
  primaryColumnName,
  serializeTargets,
  singleColumn,
} from '../src/index.js';

async function main() {
  const users = new TableSchema('users', [
    { name: 'id', type: 'uuid', kind: 'partition_key' },
    { name: 'region', type: 'text', kind: 'partition_key' },
    { name: 'signup_date', type: 'date', kind: 'clustering_key' },
    { name: 'email', type: 'text' },
    { name: 'preferences', type: 'map<text, text>' },
  ]);

  // Target strings on their own
  const localTarget = serializeTargets([multipleColumns(['id', 'region']), singleColumn('email')]);
  console.log(`Local target: ${localTarget}`);
  console.log(`  is local: ${isLocal(localTarget)}`);
  console.log(`  primary column: ${primaryColumnName(localTarget)}`);

  const parsed = parseTarget('keys(preferences)', users.resolver());
  console.log(`keys(preferences) -> mode ${parsed.mode}, column ${parsed.partitionKeyColumns[0].name}`);

  // Initialize the catalog with an in-memory database for this example
  const catalog = new IndexCatalog({ filePath: ':memory:', verbose: true });

  try {
    await catalog.connect();

    await catalog.createIndex(users, [singleColumn('email')]);
    await catalog.createIndex(users, [singleColumn('preferences')], { mode: TargetMode.Keys });
    await catalog.createIndex(users, [multipleColumns(['id', 'region']), singleColumn('email')], {
      name: 'users_by_email_local',
    });

    console.log('\nIndexes on users:');
    for (const index of await catalog.listIndexes(users).toArray()) {
      const ck = index.clusteringKeyColumns.length > 0 ? ` ck=[${index.clusteringKeyColumns.join(', ')}]` : '';
      console.log(
        `- ${index.name}: ${index.mode} pk=[${index.partitionKeyColumns.join(', ')}]${ck}${index.local ? ' (local)' : ''}`
      );
    }

    await catalog.dropIndexes(users);
  } catch (error) {
    console.error('Error:', error);
  } finally {
    await catalog.close();
  }
}

main().catch(console.error);
