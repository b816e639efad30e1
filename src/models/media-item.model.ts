import {
  DataTypes,
  Model,
  type CreationOptional,
  type InferAttributes,
  type InferCreationAttributes,
  type Sequelize,
} from "sequelize";

export class MediaItemModel extends Model<
  InferAttributes<MediaItemModel>,
  InferCreationAttributes<MediaItemModel>
> {
  declare id: CreationOptional<number>;
  declare title: string;
  declare category: string;
  declare file_path: string; // storage name, unique
  declare uploaded_at: CreationOptional<Date>;
}

export function initMediaItemModel(sequelize: Sequelize): typeof MediaItemModel {
  MediaItemModel.init(
    {
      id: {
        type: DataTypes.INTEGER,
        autoIncrement: true,
        primaryKey: true,
      },
      title: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      category: {
        type: DataTypes.STRING(50),
        allowNull: false,
      },
      file_path: {
        type: DataTypes.STRING(500),
        allowNull: false,
        unique: true,
      },
      uploaded_at: {
        type: DataTypes.DATE,
        allowNull: false,
        defaultValue: DataTypes.NOW,
      },
    },
    {
      tableName: "media_items",
      sequelize,
      timestamps: false,
      indexes: [
        { fields: ["category"] }, // list by category
      ],
    }
  );
  return MediaItemModel;
}
