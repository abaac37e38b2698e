import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, UpdateDateColumn, Unique } from "typeorm";

@Entity({ name: "cache_entry" })
@Unique(['key'])
export class CacheEntry {
    @PrimaryGeneratedColumn()
    id!: number;

    @Column()
    key!: string;

    @Column("text")
    value!: string;

    @Column("int")
    slidingExpirationSeconds!: number;

    @Column("timestamptz")
    expiresAt!: Date;

    @CreateDateColumn()
    createdAt!: Date;

    @UpdateDateColumn()
    updatedAt!: Date;
}
