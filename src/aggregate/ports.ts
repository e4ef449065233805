/** Well-known ports, used when a reference names a scheme but no port. */
const DEFAULT_PORTS: Record<string, number> = {
  http: 80, https: 443, ws: 80, wss: 443,
  ftp: 21, sftp: 22, ssh: 22,
  abfss: 443, wasbs: 443, wasb: 80, s3: 443, s3a: 443, s3n: 443, gs: 443,
  hdfs: 8020, spark: 7077, kafka: 9092,
  amqp: 5672, amqps: 5671, mqtt: 1883,
  ldap: 389, ldaps: 636, redis: 6379,
  mongodb: 27017, postgresql: 5432, postgres: 5432, mysql: 3306,
  'jdbc:postgresql': 5432, 'jdbc:mysql': 3306, 'jdbc:mariadb': 3306,
  'jdbc:sqlserver': 1433, 'jdbc:oracle': 1521,
};

export function defaultPort(scheme: string | undefined): number | undefined {
  if (!scheme) return undefined;
  const key = scheme.toLowerCase();
  return Object.hasOwn(DEFAULT_PORTS, key) ? DEFAULT_PORTS[key] : undefined;
}
