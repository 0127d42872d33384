// tsyringe は読み込み時点で Reflect のメタデータ API を要求する
import "reflect-metadata"
