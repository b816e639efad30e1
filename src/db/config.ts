import { Sequelize, type Options } from "sequelize";
import type { DbConfig } from "../config";

export function createSequelize(db: DbConfig): Sequelize {
  const options: Options = {
    dialect: db.dialect,
    logging: false,
  };

  if (db.dialect === "sqlite") {
    options.storage = db.storage || ":memory:";
  } else {
    options.host = db.host;
    options.port = db.port;
    if (db.timezone) options.timezone = db.timezone;
    options.dialectOptions = {
      // fail faster if DB doesn't respond
      connectTimeout: 10000,
    };
    options.pool = {
      max: 10, // Maximum connections in the pool
      min: 0, // don't keep idle connections open
      acquire: 50000, // Wait up to 50 seconds to acquire a connection
      idle: 20000, // Close idle connections after 20 seconds
    };
  }

  if (db.url) {
    return new Sequelize(db.url, options);
  }
  return new Sequelize(db.database ?? "", db.username ?? "", db.password, options);
}
